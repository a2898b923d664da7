import { z } from 'zod';

export const ASSESSMENT_STATUSES = ['COMPLIANT', 'PARTIAL', 'NON_COMPLIANT', 'UNKNOWN'] as const;
export const VERDICTS = ['RED', 'YELLOW', 'GREEN'] as const;

export const assessmentStatusSchema = z.enum(ASSESSMENT_STATUSES);
export const verdictSchema = z.enum(VERDICTS);
export const confidenceSchema = z.number().min(0).max(1);

export const assessmentSchema = z.object({
  requirementId: z.string().min(1),
  status: assessmentStatusSchema,
  confidence: confidenceSchema,
  evidenceQuote: z.string().nullable(),
  reasoning: z.string(),
  pageNumbers: z.array(z.number().int()),
});

export const verifiedAssessmentSchema = z.object({
  requirementId: z.string().min(1),
  originalStatus: assessmentStatusSchema,
  verifiedStatus: assessmentStatusSchema,
  originalConfidence: confidenceSchema,
  verifiedConfidence: confidenceSchema,
  verificationNotes: z.string().nullable(),
  approved: z.boolean(),
});

export type AssessmentStatus = z.infer<typeof assessmentStatusSchema>;
export type Verdict = z.infer<typeof verdictSchema>;
export type Assessment = z.infer<typeof assessmentSchema>;
export type VerifiedAssessment = z.infer<typeof verifiedAssessmentSchema>;
