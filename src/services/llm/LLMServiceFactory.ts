import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { LLMService } from './LLMService.interface.js';
import { OpenAILLMService } from './OpenAILLMService.js';
import { AnthropicLLMService } from './AnthropicLLMService.js';

export class LLMServiceFactory {
  private static instance: LLMService | null = null;

  static createLLMService(): LLMService {
    if (this.instance) {
      return this.instance;
    }

    if (!config.llm.apiKey) {
      throw new ConfigurationError(`No API key configured for LLM provider "${config.llm.provider}"`);
    }

    if (config.llm.provider === 'anthropic') {
      logger.info({ model: config.llm.model }, 'Initializing Anthropic LLM service');
      this.instance = new AnthropicLLMService();
      return this.instance;
    }

    logger.info({ provider: config.llm.provider, model: config.llm.model }, 'Initializing OpenAI-compatible LLM service');
    this.instance = new OpenAILLMService();
    return this.instance;
  }

  static reset(): void {
    this.instance = null;
  }
}
