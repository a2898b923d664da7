import type { DocumentSegment, DocumentSource } from '../../types/evidence.types.js';

export interface DocumentExtractor {
  /** Fails with ExtractionError when the document yields no readable text. */
  extract(source: DocumentSource): Promise<DocumentSegment[]>;
}
