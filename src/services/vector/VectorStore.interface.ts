export interface SegmentPayload {
  documentId: string;
  segmentIndex: number;
  text: string;
  pages: number[];
  section: string | null;
}

export interface VectorDocument {
  id: string;
  vector: number[];
  payload: SegmentPayload;
}

export interface StoredSegment {
  id: string;
  payload: SegmentPayload;
}

export interface VectorSearchResult extends StoredSegment {
  score: number;
}

export interface VectorSearchFilter {
  documentId?: string;
}

export interface VectorStore {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  testConnection(): Promise<boolean>;

  upsertDocuments(docs: VectorDocument[]): Promise<void>;
  search(query: number[], limit: number, filter?: VectorSearchFilter): Promise<VectorSearchResult[]>;
  /** Every segment of a document, in segment order. */
  listByDocumentId(documentId: string): Promise<StoredSegment[]>;
  deleteByDocumentId(documentId: string): Promise<void>;
}

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}
