import type { Requirement } from '../../domain/entities/Requirement.js';
import type { Assessment } from '../../domain/schemas/assessment.schema.js';
import type { EvidenceBundle } from '../../types/evidence.types.js';
import type { LLMService } from '../llm/LLMService.interface.js';
import { ASSESSMENT_SYSTEM_PROMPT, ASSESSMENT_USER_PROMPT } from '../llm/prompts/assessment.js';
import { parseStructuredResponse } from '../llm/jsonResponse.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { assessmentResponseSchema, type AssessmentResponse } from './responses.js';
import { UNCITED_CONFIDENCE_CAP, formatEvidence, locateQuote } from './evidence.js';
import type { AssessmentAgent } from './types.js';

export const NO_EVIDENCE_REASONING =
  'No evidence was retrieved for this requirement; the document does not appear to address it.';

export class Assessor implements AssessmentAgent {
  constructor(private readonly llm: LLMService) {}

  async assess(requirement: Requirement, evidence: EvidenceBundle): Promise<Assessment> {
    const { requirementId } = requirement;

    if (evidence.segments.length === 0) {
      logger.debug({ requirementId }, 'Empty evidence bundle, skipping assessment call');
      return unknown(requirementId, NO_EVIDENCE_REASONING);
    }

    try {
      const response = await this.llm.complete({
        purpose: 'assessment',
        systemPrompt: ASSESSMENT_SYSTEM_PROMPT,
        userPrompt: ASSESSMENT_USER_PROMPT(requirement, formatEvidence(evidence)),
        responseFormat: 'json',
      });
      const parsed = parseStructuredResponse(response.content, assessmentResponseSchema, 'assessment');
      return enforceCitation(requirementId, parsed, evidence);
    } catch (error) {
      logger.warn({ error, requirementId }, 'Assessment failed, defaulting to UNKNOWN');
      return unknown(requirementId, `Assessment failed due to error: ${errorMessage(error)}`);
    }
  }
}

function unknown(requirementId: string, reasoning: string): Assessment {
  return {
    requirementId,
    status: 'UNKNOWN',
    confidence: 0,
    evidenceQuote: null,
    reasoning,
    pageNumbers: [],
  };
}

/**
 * Holds the model to its citations: a quote is kept only if it is found in
 * the bundle, and any status other than UNKNOWN needs such a quote.
 */
export function enforceCitation(
  requirementId: string,
  response: AssessmentResponse,
  evidence: EvidenceBundle
): Assessment {
  const quote = response.evidence_quote?.trim() || null;
  const match = quote ? locateQuote(quote, evidence.segments) : undefined;

  const bundlePages = new Set(evidence.segments.flatMap(segment => segment.pages));
  let pageNumbers = [...new Set(response.page_numbers ?? [])].filter(page => bundlePages.has(page));
  if (pageNumbers.length === 0 && match) {
    pageNumbers = [...match.pages];
  }

  if (response.status !== 'UNKNOWN' && !match) {
    const problem = quote
      ? 'the quoted passage was not found in the retrieved evidence'
      : 'no verbatim evidence quote was provided';
    logger.info({ requirementId, proposed: response.status }, 'Uncited assessment downgraded to UNKNOWN');
    return {
      requirementId,
      status: 'UNKNOWN',
      confidence: Math.min(response.confidence, UNCITED_CONFIDENCE_CAP),
      evidenceQuote: null,
      reasoning: `${response.reasoning} [Downgraded from ${response.status} to UNKNOWN: ${problem}.]`,
      pageNumbers,
    };
  }

  return {
    requirementId,
    status: response.status,
    confidence: response.confidence,
    evidenceQuote: match ? quote : null,
    reasoning: response.reasoning,
    pageNumbers,
  };
}
