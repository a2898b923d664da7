import { z } from 'zod';
import { assessmentStatusSchema } from './assessment.schema.js';

export const agentExecutionTraceSchema = z.object({
  agentName: z.string(),
  startedAt: z.string(),
  durationMs: z.number(),
  inputSummary: z.record(z.unknown()),
  outputSummary: z.record(z.unknown()),
  success: z.boolean(),
  error: z.string().nullable(),
});

export const requirementEvaluationTraceSchema = z.object({
  requirementId: z.string(),
  retrievalStrategy: z.string(),
  evidenceSegments: z.number().int(),
  assessmentStatus: assessmentStatusSchema,
  assessmentConfidence: z.number(),
  verifiedStatus: assessmentStatusSchema.nullable(),
  verifiedConfidence: z.number().nullable(),
  finalStatus: assessmentStatusSchema,
  finalConfidence: z.number(),
  wasDowngraded: z.boolean(),
  verificationNotes: z.string().nullable(),
  durationMs: z.number(),
  error: z.string().nullable(),
});

export const executionTraceSchema = z.object({
  agents: z.record(agentExecutionTraceSchema),
  requirementEvaluations: z.record(requirementEvaluationTraceSchema),
  latencies: z.record(z.number()),
  capturedAt: z.string(),
});

export type AgentExecutionTrace = z.infer<typeof agentExecutionTraceSchema>;
export type RequirementEvaluationTrace = z.infer<typeof requirementEvaluationTraceSchema>;
export type ExecutionTrace = z.infer<typeof executionTraceSchema>;
