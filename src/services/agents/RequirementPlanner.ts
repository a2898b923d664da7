import type { RequirementSummary } from '../../domain/entities/Requirement.js';
import type { RequirementPlan } from '../../types/evidence.types.js';
import type { LLMService } from '../llm/LLMService.interface.js';
import { PLANNER_SYSTEM_PROMPT, PLANNER_USER_PROMPT } from '../llm/prompts/planner.js';
import { parseStructuredResponse } from '../llm/jsonResponse.js';
import { ConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { plannerResponseSchema } from './responses.js';
import type { PlanningAgent, PlanningContext } from './types.js';

export const PLANNER_FALLBACK_REASONING = 'Fallback: evaluating all requirements due to planner error';

/**
 * Narrows the catalog to the requirements worth evaluating. The returned ids
 * are the model's; the orchestrator filters them against the catalog.
 */
export class RequirementPlanner implements PlanningAgent {
  constructor(private readonly llm: LLMService) {}

  async plan(requirements: readonly RequirementSummary[], context: PlanningContext): Promise<RequirementPlan> {
    if (requirements.length === 0) {
      throw new ConfigurationError('Cannot plan an audit against an empty requirement catalog');
    }

    try {
      const response = await this.llm.complete({
        purpose: 'planner',
        systemPrompt: PLANNER_SYSTEM_PROMPT,
        userPrompt: PLANNER_USER_PROMPT(requirements, context),
        responseFormat: 'json',
      });
      const parsed = parseStructuredResponse(response.content, plannerResponseSchema, 'planner');

      logger.info(
        { selected: parsed.requirement_ids.length, available: requirements.length },
        'Requirement plan produced'
      );

      return {
        requirementIds: parsed.requirement_ids,
        reasoning: parsed.reasoning ?? null,
        fallback: false,
      };
    } catch (error) {
      logger.warn({ error, available: requirements.length }, 'Planner failed, evaluating the whole catalog');
      return {
        requirementIds: requirements.map(requirement => requirement.requirementId),
        reasoning: PLANNER_FALLBACK_REASONING,
        fallback: true,
      };
    }
  }
}
