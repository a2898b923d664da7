import { z } from 'zod';
import { assessmentStatusSchema, confidenceSchema, verdictSchema } from './assessment.schema.js';
import { executionTraceSchema } from './trace.schema.js';

export const frozenRequirementResultSchema = z.object({
  requirementId: z.string(),
  status: assessmentStatusSchema,
  confidence: confidenceSchema,
  reasoning: z.string(),
  evidenceQuote: z.string().nullable(),
  evidenceHash: z.string().nullable(),
  pageNumbers: z.array(z.number().int()),
});

export const snapshotBodySchema = z.object({
  snapshotVersion: z.string(),
  auditId: z.string(),
  engine: z.object({
    name: z.string(),
    version: z.string(),
    evaluationDate: z.string(),
  }),
  framework: z.object({
    name: z.string().nullable(),
    version: z.string().nullable(),
    effectiveDate: z.string().nullable(),
  }),
  results: z.object({
    overallVerdict: verdictSchema,
    requirements: z.array(frozenRequirementResultSchema),
  }),
  metadata: z.object({
    executionTrace: executionTraceSchema,
    integrityCheckPassed: z.boolean(),
  }),
});

export const snapshotSchema = snapshotBodySchema.extend({
  fingerprint: z.string().regex(/^[a-f0-9]{64}$/),
});

export type FrozenRequirementResult = z.infer<typeof frozenRequirementResultSchema>;
export type SnapshotBody = z.infer<typeof snapshotBodySchema>;
export type Snapshot = z.infer<typeof snapshotSchema>;
