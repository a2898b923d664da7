import type OpenAI from 'openai';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { LLMCallError, LLMResponseError, errorMessage } from '../../utils/errors.js';
import type { CompletionRequest, CompletionResponse, LLMService } from './LLMService.interface.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';

/** Serves both OpenAI and OpenRouter; the client factory picks the base URL. */
export class OpenAILLMService implements LLMService {
  private client: OpenAI;

  constructor() {
    this.client = OpenAIClientFactory.getClient();
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'OpenAI connection check failed');
      return false;
    }
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    try {
      logger.debug(
        { purpose: request.purpose, promptLength: request.userPrompt.length, model: config.llm.model },
        'Sending completion request to OpenAI'
      );

      const completion = await this.client.chat.completions.create({
        model: config.llm.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
        temperature: request.temperature ?? config.llm.temperature,
        max_tokens: request.maxTokens ?? config.llm.maxTokens,
        response_format: request.responseFormat === 'json' ? { type: 'json_object' } : undefined,
      });

      const [choice] = completion.choices;
      const content = choice?.message.content;
      if (!content) {
        throw new LLMResponseError('Empty response from OpenAI', { finishReason: choice?.finish_reason });
      }
      if (choice.finish_reason === 'length') {
        logger.warn({ purpose: request.purpose }, 'OpenAI response truncated at max_tokens');
      }

      return {
        content,
        model: completion.model,
        tokensUsed: completion.usage?.total_tokens,
      };
    } catch (error) {
      logger.error({ error, purpose: request.purpose }, 'OpenAI completion failed');
      if (error instanceof LLMResponseError) {
        throw error;
      }
      throw new LLMCallError(`OpenAI API error: ${errorMessage(error)}`, error);
    }
  }
}
