import type { EvidenceBundle, EvidenceSegment, IndexedSegment, RetrievalQuery } from '../../types/evidence.types.js';
import { logger } from '../../utils/logger.js';
import type { SegmentSource } from '../indexing/DocumentIndex.interface.js';
import type { EvidenceRetriever } from './EvidenceRetriever.interface.js';

const LENGTH_BONUS_CAP = 500;

const toEvidence = (segment: IndexedSegment, score: number): EvidenceSegment => ({
  segmentId: segment.segmentId,
  text: segment.text,
  pages: segment.pages,
  section: segment.sectionContext,
  score,
});

/**
 * Keyword retrieval for when no vector index is available. A segment scores
 * one point per keyword it contains plus up to one point for length.
 */
export class LexicalEvidenceRetriever implements EvidenceRetriever {
  readonly strategy = 'lexical' as const;

  constructor(private readonly source: SegmentSource) {}

  async retrieve(query: RetrievalQuery): Promise<EvidenceBundle> {
    const segments = await this.source.listSegments(query.auditId);
    const keywords = query.keywords.map(keyword => keyword.toLowerCase());

    const matched = segments
      .map((segment, order) => {
        const text = segment.text.toLowerCase();
        const hits = keywords.filter(keyword => text.includes(keyword)).length;
        const score = hits + Math.min(segment.text.length, LENGTH_BONUS_CAP) / LENGTH_BONUS_CAP;
        return { segment, order, hits, score };
      })
      .filter(candidate => candidate.hits > 0)
      .sort((a, b) => b.score - a.score || a.order - b.order);

    if (matched.length === 0) {
      logger.debug(
        { requirementId: query.requirementId, available: segments.length },
        'No keyword matches, widening to leading segments'
      );
      return {
        requirementId: query.requirementId,
        strategy: this.strategy,
        segments: segments.slice(0, query.limit).map(segment => toEvidence(segment, 0)),
      };
    }

    return {
      requirementId: query.requirementId,
      strategy: this.strategy,
      segments: matched.slice(0, query.limit).map(candidate => toEvidence(candidate.segment, candidate.score)),
    };
  }
}
