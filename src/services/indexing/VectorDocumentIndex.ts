import type { DocumentSegment, IndexedSegment } from '../../types/evidence.types.js';
import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import type { Embedder, StoredSegment, VectorStore } from '../vector/VectorStore.interface.js';
import { segmentId, type DocumentIndex } from './DocumentIndex.interface.js';

export function toIndexedSegment(stored: StoredSegment): IndexedSegment {
  return {
    segmentId: stored.id,
    auditId: stored.payload.documentId,
    segmentIndex: stored.payload.segmentIndex,
    text: stored.payload.text,
    pages: stored.payload.pages,
    sectionContext: stored.payload.section ?? undefined,
  };
}

/** Embeds segments and stores them in the vector store under the audit id. */
export class VectorDocumentIndex implements DocumentIndex {
  constructor(
    private readonly vectorStore: VectorStore,
    private readonly embedder: Embedder
  ) {}

  async index(auditId: string, segments: readonly DocumentSegment[]): Promise<IndexedSegment[]> {
    const offset = (await this.vectorStore.listByDocumentId(auditId)).length;
    const vectors = await this.embedder.embed(segments.map(segment => segment.text));
    if (vectors.length !== segments.length) {
      throw new ValidationError('Embedder returned a different number of vectors than segments', {
        segments: segments.length,
        vectors: vectors.length,
      });
    }

    const docs = segments.map((segment, i) => ({
      id: segmentId(auditId, offset + i),
      vector: vectors[i],
      payload: {
        documentId: auditId,
        segmentIndex: offset + i,
        text: segment.text,
        pages: [...segment.pages],
        section: segment.sectionContext ?? null,
      },
    }));

    await this.vectorStore.upsertDocuments(docs);
    logger.info({ auditId, count: docs.length }, 'Segments embedded and indexed');

    return docs.map(doc => toIndexedSegment({ id: doc.id, payload: doc.payload }));
  }

  async listSegments(auditId: string): Promise<IndexedSegment[]> {
    const stored = await this.vectorStore.listByDocumentId(auditId);
    return stored.map(toIndexedSegment);
  }

  async release(auditId: string): Promise<void> {
    await this.vectorStore.deleteByDocumentId(auditId);
    logger.debug({ auditId }, 'Segment vectors released');
  }
}
