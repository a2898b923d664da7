import Anthropic from '@anthropic-ai/sdk';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { LLMCallError, LLMResponseError, errorMessage } from '../../utils/errors.js';
import type { CompletionRequest, CompletionResponse, LLMService } from './LLMService.interface.js';

const JSON_ONLY_INSTRUCTION = '\n\nRespond with a single JSON object and nothing else.';

export class AnthropicLLMService implements LLMService {
  private client: Anthropic;

  constructor() {
    this.client = new Anthropic({
      apiKey: config.llm.apiKey,
      timeout: 60_000,
      maxRetries: 2,
    });
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: config.llm.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Anthropic connection check failed');
      return false;
    }
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    try {
      logger.debug(
        { purpose: request.purpose, promptLength: request.userPrompt.length, model: config.llm.model },
        'Sending completion request to Anthropic'
      );

      const message = await this.client.messages.create({
        model: config.llm.model,
        max_tokens: request.maxTokens ?? config.llm.maxTokens,
        temperature: request.temperature ?? config.llm.temperature,
        system: request.responseFormat === 'json' ? request.systemPrompt + JSON_ONLY_INSTRUCTION : request.systemPrompt,
        messages: [{ role: 'user', content: request.userPrompt }],
      });

      const text = message.content
        .flatMap(block => (block.type === 'text' ? [block.text] : []))
        .join('');
      if (text.length === 0) {
        throw new LLMResponseError('Anthropic returned no text content', { stopReason: message.stop_reason });
      }
      if (message.stop_reason === 'max_tokens') {
        logger.warn({ purpose: request.purpose }, 'Anthropic response truncated at max_tokens');
      }

      return {
        content: text,
        model: message.model,
        tokensUsed: message.usage.input_tokens + message.usage.output_tokens,
      };
    } catch (error) {
      logger.error({ error, purpose: request.purpose }, 'Anthropic completion failed');
      if (error instanceof LLMResponseError) {
        throw error;
      }
      throw new LLMCallError(`Anthropic API error: ${errorMessage(error)}`, error);
    }
  }
}
