import { z } from 'zod';
import { EVALUATION_MODES } from '../../config/validation.js';
import { assessmentSchema, verdictSchema } from './assessment.schema.js';
import { executionTraceSchema } from './trace.schema.js';
import { snapshotSchema } from './snapshot.schema.js';

export const RETRIEVAL_STRATEGIES = ['hybrid', 'lexical'] as const;

export const orchestrationResultSchema = z.object({
  assessments: z.array(assessmentSchema),
  overallVerdict: verdictSchema,
  metadata: z.object({
    evaluatedAt: z.string(),
    evaluationMode: z.enum(EVALUATION_MODES),
    retrievalStrategy: z.enum(RETRIEVAL_STRATEGIES),
    totalRequirements: z.number().int(),
    evaluatedRequirements: z.number().int(),
    plannerFallback: z.boolean(),
    plannerReasoning: z.string().nullable(),
    rejectedRequirementIds: z.array(z.string()),
    engineVersion: z.string(),
    totalLatencyMs: z.number(),
    latencies: z.record(z.number()),
    executionTrace: executionTraceSchema,
    snapshot: snapshotSchema,
  }),
});

export const auditReportSchema = z.discriminatedUnion('outcome', [
  z.object({
    outcome: z.literal('COMPLETED'),
    result: orchestrationResultSchema,
  }),
  z.object({
    outcome: z.literal('FAILED'),
    error: z.string(),
    failedAt: z.string(),
  }),
]);

export type RetrievalStrategy = (typeof RETRIEVAL_STRATEGIES)[number];
export type OrchestrationResult = z.infer<typeof orchestrationResultSchema>;
export type AuditReport = z.infer<typeof auditReportSchema>;
