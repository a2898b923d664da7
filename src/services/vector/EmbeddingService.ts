import type OpenAI from 'openai';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { LLMCallError, ValidationError } from '../../utils/errors.js';
import { EmbeddingClientFactory } from './EmbeddingClientFactory.js';
import type { Embedder } from './VectorStore.interface.js';

const MAX_BATCH_SIZE = 2048;

export class EmbeddingService implements Embedder {
  private client: OpenAI;
  private model: string;

  constructor() {
    this.client = EmbeddingClientFactory.getClient();
    this.model = config.embedding.provider === 'azure' && config.embedding.deployment
      ? config.embedding.deployment
      : config.embedding.model;
  }

  /** One vector per input text, in input order. */
  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const emptyAt = texts.findIndex(text => text.trim().length === 0);
    if (emptyAt >= 0) {
      throw new ValidationError('Cannot embed empty text', { index: emptyAt });
    }

    try {
      const embeddings: number[][] = [];

      for (let i = 0; i < texts.length; i += MAX_BATCH_SIZE) {
        const batch = texts.slice(i, i + MAX_BATCH_SIZE);
        const response = await this.client.embeddings.create({ model: this.model, input: batch });
        embeddings.push(...response.data.sort((a, b) => a.index - b.index).map(item => item.embedding));

        logger.debug(
          { batch: Math.floor(i / MAX_BATCH_SIZE) + 1, processed: embeddings.length, total: texts.length },
          'Embedding batch complete'
        );
      }

      return embeddings;
    } catch (error) {
      logger.error({ error, count: texts.length }, 'Failed to generate embeddings');
      throw new LLMCallError('Embedding generation failed', error);
    }
  }
}
