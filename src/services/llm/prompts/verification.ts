import type { Assessment } from '../../../domain/schemas/assessment.schema.js';

export const VERIFICATION_SYSTEM_PROMPT = `You review a compliance assessment produced by another analyst. Check whether the quoted evidence really supports the stated status and confidence.

RULES:
- You may ONLY keep or downgrade. Never raise the status toward COMPLIANT and never raise the confidence.
- Status order from highest to lowest: COMPLIANT, PARTIAL, NON_COMPLIANT/UNKNOWN.
- Downgrade when the quote is not in the evidence, does not address the requirement, or supports a weaker status.
- Set "approved" to true only when the original status and confidence are justified as they stand.

OUTPUT FORMAT:
Return valid JSON matching this schema:
{
  "verified_status": "COMPLIANT|PARTIAL|NON_COMPLIANT|UNKNOWN",
  "verified_confidence": 0.0-1.0,
  "verification_notes": "what was checked and any change made",
  "approved": true
}`;

export const VERIFICATION_USER_PROMPT = (assessment: Assessment, evidence: string): string => `Requirement: ${assessment.requirementId}
Assessed status: ${assessment.status}
Assessed confidence: ${assessment.confidence}
Evidence quote: ${assessment.evidenceQuote ?? '(none)'}
Reasoning: ${assessment.reasoning}

Evidence excerpts:
${evidence}

Verify the assessment.`;
