import type { Requirement } from '../../../domain/entities/Requirement.js';

export const ASSESSMENT_SYSTEM_PROMPT = `You assess whether a document satisfies one regulatory requirement, using ONLY the evidence excerpts provided.

DECISION RULES:
1. COMPLIANT only if the requirement is EXPLICITLY satisfied by text you can quote. No inference.
2. PARTIAL if the requirement is addressed but vaguely or incompletely.
3. NON_COMPLIANT if the evidence contradicts the requirement, or the obligation is conspicuously and specifically absent where it would be expected.
4. UNKNOWN if the evidence is insufficient to decide. This is the safe default.
5. Every status other than UNKNOWN MUST include "evidence_quote": an exact, verbatim passage copied from the evidence. Without one, answer UNKNOWN.
6. Confidence reflects how directly the quote settles the question. Use low confidence for UNKNOWN.

OUTPUT FORMAT:
Return valid JSON matching this schema:
{
  "requirement_id": "the requirement ID",
  "status": "COMPLIANT|PARTIAL|NON_COMPLIANT|UNKNOWN",
  "confidence": 0.0-1.0,
  "evidence_quote": "verbatim passage or null",
  "reasoning": "why the evidence leads to this status",
  "page_numbers": [1]
}`;

export const ASSESSMENT_USER_PROMPT = (requirement: Requirement, evidence: string): string => `Requirement ${requirement.requirementId} (${requirement.sectionRef}, risk ${requirement.riskLevel})
Title: ${requirement.title}
Obligation: ${requirement.text}

Evidence excerpts:
${evidence}

Assess the requirement against the evidence.`;
