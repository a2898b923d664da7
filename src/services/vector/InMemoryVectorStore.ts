import type {
  StoredSegment,
  VectorDocument,
  VectorSearchFilter,
  VectorSearchResult,
  VectorStore,
} from './VectorStore.interface.js';

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/** Process-local store for development and tests. */
export class InMemoryVectorStore implements VectorStore {
  private readonly documents = new Map<string, VectorDocument>();

  async connect(): Promise<void> {}

  async disconnect(): Promise<void> {
    this.documents.clear();
  }

  async testConnection(): Promise<boolean> {
    return true;
  }

  async upsertDocuments(docs: VectorDocument[]): Promise<void> {
    for (const doc of docs) {
      this.documents.set(doc.id, { id: doc.id, vector: [...doc.vector], payload: { ...doc.payload } });
    }
  }

  async search(query: number[], limit: number, filter?: VectorSearchFilter): Promise<VectorSearchResult[]> {
    return [...this.documents.values()]
      .filter(doc => !filter?.documentId || doc.payload.documentId === filter.documentId)
      .map(doc => ({ id: doc.id, payload: doc.payload, score: cosineSimilarity(query, doc.vector) }))
      .sort((a, b) => b.score - a.score || a.payload.segmentIndex - b.payload.segmentIndex)
      .slice(0, limit);
  }

  async listByDocumentId(documentId: string): Promise<StoredSegment[]> {
    return [...this.documents.values()]
      .filter(doc => doc.payload.documentId === documentId)
      .sort((a, b) => a.payload.segmentIndex - b.payload.segmentIndex)
      .map(doc => ({ id: doc.id, payload: doc.payload }));
  }

  async deleteByDocumentId(documentId: string): Promise<void> {
    for (const [id, doc] of this.documents) {
      if (doc.payload.documentId === documentId) this.documents.delete(id);
    }
  }
}
