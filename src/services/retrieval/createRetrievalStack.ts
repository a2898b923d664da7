import type { RetrievalMode } from '../../config/validation.js';
import type { RetrievalStrategy } from '../../domain/schemas/report.schema.js';
import { ConfigurationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { DocumentIndex } from '../indexing/DocumentIndex.interface.js';
import { InMemoryDocumentIndex } from '../indexing/InMemoryDocumentIndex.js';
import { VectorDocumentIndex } from '../indexing/VectorDocumentIndex.js';
import type { Embedder, VectorStore } from '../vector/VectorStore.interface.js';
import type { EvidenceRetriever } from './EvidenceRetriever.interface.js';
import { HybridEvidenceRetriever } from './HybridEvidenceRetriever.js';
import { LexicalEvidenceRetriever } from './LexicalEvidenceRetriever.js';

export interface RetrievalStack {
  strategy: RetrievalStrategy;
  index: DocumentIndex;
  retriever: EvidenceRetriever;
}

export interface RetrievalStackOptions {
  mode: RetrievalMode;
  vectorStore: VectorStore | null;
  embedder: Embedder | null;
}

/** Picks hybrid retrieval when a reachable vector index exists, lexical otherwise. */
export async function createRetrievalStack(options: RetrievalStackOptions): Promise<RetrievalStack> {
  const { mode, vectorStore, embedder } = options;

  if (mode !== 'lexical' && vectorStore && embedder) {
    if (await vectorStore.testConnection()) {
      logger.info('Using hybrid evidence retrieval');
      return {
        strategy: 'hybrid',
        index: new VectorDocumentIndex(vectorStore, embedder),
        retriever: new HybridEvidenceRetriever(vectorStore, embedder),
      };
    }
  }

  if (mode === 'hybrid') {
    throw new ConfigurationError('Hybrid retrieval requested but no reachable vector index is configured');
  }
  if (mode === 'auto' && vectorStore) {
    logger.warn('Vector index unavailable, falling back to lexical retrieval');
  } else {
    logger.info('Using lexical evidence retrieval');
  }

  const index = new InMemoryDocumentIndex();
  return { strategy: 'lexical', index, retriever: new LexicalEvidenceRetriever(index) };
}
