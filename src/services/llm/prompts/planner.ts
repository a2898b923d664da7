import { byDescendingRisk, type RequirementSummary } from '../../../domain/entities/Requirement.js';

export const PLANNER_SYSTEM_PROMPT = `You plan compliance audits. Given the requirements of a regulatory framework, select the ones that must be evaluated for the document under audit.

RULES:
- ONLY select from the provided requirement IDs. Never invent, rename or merge IDs.
- When unsure whether a requirement applies, include it.
- Prefer HIGH and CRITICAL risk requirements over none at all.

OUTPUT FORMAT:
Return valid JSON matching this schema:
{
  "requirement_ids": ["ID-1", "ID-2"],
  "reasoning": "One short paragraph explaining the selection"
}`;

export const PLANNER_USER_PROMPT = (
  requirements: readonly RequirementSummary[],
  context: { frameworkName: string | null; documentName?: string }
): string => {
  const catalog = byDescendingRisk(requirements)
    .map(requirement => `- ${requirement.requirementId} [${requirement.riskLevel}]: ${requirement.title}`)
    .join('\n');

  return `Framework: ${context.frameworkName ?? 'unspecified'}
Document: ${context.documentName ?? 'unspecified'}

Available requirements:
${catalog}

Select the requirement IDs to evaluate.`;
};
