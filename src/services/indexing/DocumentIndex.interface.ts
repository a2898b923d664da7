import type { DocumentSegment, IndexedSegment } from '../../types/evidence.types.js';

export interface SegmentSource {
  /** Every segment indexed for the audit, in document order. */
  listSegments(auditId: string): Promise<IndexedSegment[]>;
}

export interface DocumentIndex extends SegmentSource {
  index(auditId: string, segments: readonly DocumentSegment[]): Promise<IndexedSegment[]>;
  /** Drops every segment indexed for the audit. */
  release(auditId: string): Promise<void>;
}

export const segmentId = (auditId: string, segmentIndex: number): string => `${auditId}:${segmentIndex}`;
