import type { RetrievalStrategy } from '../domain/schemas/report.schema.js';

/** A unit of document text as produced by extraction. */
export interface DocumentSegment {
  text: string;
  pages: number[];
  sectionContext?: string;
}

/** A segment once stored in an audit's document index. */
export interface IndexedSegment extends DocumentSegment {
  segmentId: string;
  auditId: string;
  segmentIndex: number;
}

export type DocumentSource =
  | { kind: 'segments'; fileName: string; segments: DocumentSegment[] }
  | { kind: 'buffer'; fileName: string; data: Buffer }
  | { kind: 'file'; path: string; fileName?: string };

export interface EvidenceSegment {
  segmentId: string;
  text: string;
  pages: number[];
  section?: string;
  score: number;
}

export interface EvidenceBundle {
  requirementId: string;
  strategy: RetrievalStrategy;
  segments: EvidenceSegment[];
}

export interface RetrievalQuery {
  auditId: string;
  requirementId: string;
  query: string;
  keywords: string[];
  limit: number;
}

export interface RequirementPlan {
  requirementIds: string[];
  reasoning: string | null;
  fallback: boolean;
}
