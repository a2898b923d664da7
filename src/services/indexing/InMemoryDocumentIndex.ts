import type { DocumentSegment, IndexedSegment } from '../../types/evidence.types.js';
import { logger } from '../../utils/logger.js';
import { segmentId, type DocumentIndex } from './DocumentIndex.interface.js';

/** Per-audit segment list backing lexical retrieval, held until released. */
export class InMemoryDocumentIndex implements DocumentIndex {
  private readonly segmentsByAudit = new Map<string, IndexedSegment[]>();

  async index(auditId: string, segments: readonly DocumentSegment[]): Promise<IndexedSegment[]> {
    const existing = this.segmentsByAudit.get(auditId) ?? [];
    const indexed = segments.map((segment, offset) => {
      const segmentIndex = existing.length + offset;
      return {
        segmentId: segmentId(auditId, segmentIndex),
        auditId,
        segmentIndex,
        text: segment.text,
        pages: [...segment.pages],
        sectionContext: segment.sectionContext,
      };
    });

    this.segmentsByAudit.set(auditId, [...existing, ...indexed]);
    logger.debug({ auditId, count: indexed.length }, 'Segments indexed in memory');
    return indexed;
  }

  async listSegments(auditId: string): Promise<IndexedSegment[]> {
    return [...(this.segmentsByAudit.get(auditId) ?? [])];
  }

  async release(auditId: string): Promise<void> {
    if (this.segmentsByAudit.delete(auditId)) {
      logger.debug({ auditId }, 'Segments released from memory');
    }
  }
}
