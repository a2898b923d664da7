import { z } from 'zod';
import { assessmentStatusSchema } from '../../domain/schemas/assessment.schema.js';

const normalizedStatus = z.preprocess(
  value => (typeof value === 'string' ? value.trim().toUpperCase().replace(/[\s-]+/g, '_') : value),
  assessmentStatusSchema
);

export const plannerResponseSchema = z.object({
  requirement_ids: z.array(z.string().trim().min(1)).min(1),
  reasoning: z.string().nullish(),
});

export const assessmentResponseSchema = z.object({
  requirement_id: z.string().optional(),
  status: normalizedStatus,
  confidence: z.coerce.number().min(0).max(1),
  evidence_quote: z.string().nullish(),
  reasoning: z.string().trim().min(1),
  page_numbers: z.array(z.coerce.number().int()).nullish(),
});

export const verificationResponseSchema = z.object({
  verified_status: normalizedStatus,
  verified_confidence: z.coerce.number().min(0).max(1),
  verification_notes: z.string().nullish(),
  approved: z.boolean(),
});

export type AssessmentResponse = z.infer<typeof assessmentResponseSchema>;
