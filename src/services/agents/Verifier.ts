import type { Assessment, VerifiedAssessment } from '../../domain/schemas/assessment.schema.js';
import type { EvidenceBundle } from '../../types/evidence.types.js';
import { clampToOriginal } from '../../domain/assessment/statusOrder.js';
import type { LLMService } from '../llm/LLMService.interface.js';
import { VERIFICATION_SYSTEM_PROMPT, VERIFICATION_USER_PROMPT } from '../llm/prompts/verification.js';
import { parseStructuredResponse } from '../llm/jsonResponse.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { verificationResponseSchema } from './responses.js';
import { UNCITED_CONFIDENCE_CAP, formatEvidence, locateQuote } from './evidence.js';
import type { VerificationAgent } from './types.js';

/**
 * Second opinion on an assessment. Can hold or lower the status and
 * confidence, never raise them; a failed review approves the original.
 */
export class Verifier implements VerificationAgent {
  constructor(private readonly llm: LLMService) {}

  async verify(assessment: Assessment, evidence: EvidenceBundle): Promise<VerifiedAssessment> {
    const keep = (verificationNotes: string, approved: boolean): VerifiedAssessment => ({
      requirementId: assessment.requirementId,
      originalStatus: assessment.status,
      verifiedStatus: assessment.status,
      originalConfidence: assessment.confidence,
      verifiedConfidence: assessment.confidence,
      verificationNotes,
      approved,
    });

    if (assessment.status === 'UNKNOWN' && assessment.confidence === 0) {
      return keep('Nothing to verify: the assessment is already UNKNOWN with zero confidence.', true);
    }

    if (assessment.status !== 'UNKNOWN') {
      const cited = assessment.evidenceQuote ? locateQuote(assessment.evidenceQuote, evidence.segments) : undefined;
      if (!cited) {
        logger.info({ requirementId: assessment.requirementId }, 'Cited evidence not found, downgrading');
        return {
          ...keep('The cited evidence is not present in the retrieved segments; downgraded to UNKNOWN.', false),
          verifiedStatus: 'UNKNOWN',
          verifiedConfidence: Math.min(assessment.confidence, UNCITED_CONFIDENCE_CAP),
        };
      }
    }

    try {
      const response = await this.llm.complete({
        purpose: 'verification',
        systemPrompt: VERIFICATION_SYSTEM_PROMPT,
        userPrompt: VERIFICATION_USER_PROMPT(assessment, formatEvidence(evidence)),
        responseFormat: 'json',
      });
      const parsed = parseStructuredResponse(response.content, verificationResponseSchema, 'verification');

      const clamped = clampToOriginal(assessment, {
        status: parsed.verified_status,
        confidence: parsed.verified_confidence,
      });
      if (clamped.rejections.length > 0) {
        logger.warn(
          { requirementId: assessment.requirementId, rejections: clamped.rejections },
          'Verifier attempted to upgrade an assessment'
        );
      }

      const notes = [parsed.verification_notes?.trim(), ...clamped.rejections].filter(Boolean).join(' ');

      return {
        requirementId: assessment.requirementId,
        originalStatus: assessment.status,
        verifiedStatus: clamped.status,
        originalConfidence: assessment.confidence,
        verifiedConfidence: clamped.confidence,
        verificationNotes: notes.length > 0 ? notes : null,
        approved: parsed.approved,
      };
    } catch (error) {
      logger.warn({ error, requirementId: assessment.requirementId }, 'Verification failed, approving original');
      return keep(`Verification skipped due to error: ${errorMessage(error)}`, true);
    }
  }
}
