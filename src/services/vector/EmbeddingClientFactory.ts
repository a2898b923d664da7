import OpenAI from 'openai';
import { config } from '../../config/index.js';
import { ConfigurationError } from '../../utils/errors.js';

export class EmbeddingClientFactory {
  private static instance: OpenAI | null = null;

  static getClient(): OpenAI {
    if (this.instance) {
      return this.instance;
    }

    const { provider, apiKey, endpoint, apiVersion, deployment } = config.embedding;

    if (!apiKey) {
      throw new ConfigurationError(`No API key configured for ${provider} embeddings`);
    }

    if (provider === 'azure') {
      if (!endpoint || !deployment) {
        throw new ConfigurationError(
          'Azure OpenAI configuration required: AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_EMBEDDING_DEPLOYMENT'
        );
      }
      this.instance = new OpenAI({
        apiKey,
        baseURL: `${endpoint}/openai/deployments/${deployment}`,
        defaultQuery: { 'api-version': apiVersion ?? '2024-02-01' },
        defaultHeaders: { 'api-key': apiKey },
      });
      return this.instance;
    }

    this.instance = new OpenAI({ apiKey, timeout: 60_000, maxRetries: 2 });
    return this.instance;
  }

  static reset(): void {
    this.instance = null;
  }
}
