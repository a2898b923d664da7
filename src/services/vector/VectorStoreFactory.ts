import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { ConfigurationError } from '../../utils/errors.js';
import type { Neo4jClient } from '../graph/Neo4jClient.js';
import type { VectorStore } from './VectorStore.interface.js';
import { InMemoryVectorStore } from './InMemoryVectorStore.js';
import { Neo4jVectorStore } from './Neo4jVectorStore.js';

/** `null` when no vector index is configured; retrieval then runs lexically. */
export const createVectorStore = (neo4jClient: Neo4jClient | null): VectorStore | null => {
  const provider = config.vectorStore.provider;
  logger.info({ provider }, 'Creating vector store');

  switch (provider) {
    case 'neo4j':
      if (!neo4jClient) {
        throw new ConfigurationError('The neo4j vector store needs a Neo4j connection');
      }
      return new Neo4jVectorStore(neo4jClient);
    case 'memory':
      return new InMemoryVectorStore();
    case 'none':
      return null;
  }
};
