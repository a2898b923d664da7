import type { EvidenceBundle, RetrievalQuery } from '../../types/evidence.types.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { Embedder, VectorStore } from '../vector/VectorStore.interface.js';
import type { EvidenceRetriever } from './EvidenceRetriever.interface.js';

const PHRASE_LENGTH = 20;
const PHRASE_BONUS = 0.5;
const KEYWORD_WEIGHT = 0.25;
const CANDIDATE_MULTIPLIER = 3;

export function lexicalBonus(text: string, phrase: string, keywords: readonly string[]): number {
  const haystack = text.toLowerCase();
  if (phrase.length > 0 && haystack.includes(phrase)) return PHRASE_BONUS;
  if (keywords.length === 0) return 0;
  const hits = keywords.filter(keyword => haystack.includes(keyword.toLowerCase())).length;
  return (KEYWORD_WEIGHT * hits) / keywords.length;
}

/**
 * Semantic similarity from the vector index plus a lexical bonus, over the
 * segments of one audit's document.
 */
export class HybridEvidenceRetriever implements EvidenceRetriever {
  readonly strategy = 'hybrid' as const;

  constructor(
    private readonly vectorStore: VectorStore,
    private readonly embedder: Embedder
  ) {}

  async retrieve(query: RetrievalQuery): Promise<EvidenceBundle> {
    const segments = await this.vectorStore.listByDocumentId(query.auditId);
    if (segments.length === 0) {
      return { requirementId: query.requirementId, strategy: this.strategy, segments: [] };
    }

    const [queryVector] = await this.embedder.embed([query.query]);
    if (!queryVector) {
      throw new ValidationError('Embedder returned no vector for the retrieval query');
    }

    const hits = await this.vectorStore.search(queryVector, query.limit * CANDIDATE_MULTIPLIER, {
      documentId: query.auditId,
    });
    const semantic = new Map(hits.map(hit => [hit.id, hit.score]));
    const phrase = query.query.trim().toLowerCase().slice(0, PHRASE_LENGTH).trim();

    const ranked = segments
      .map((segment, order) => ({
        segment,
        order,
        score: (semantic.get(segment.id) ?? 0) + lexicalBonus(segment.payload.text, phrase, query.keywords),
      }))
      .filter(candidate => candidate.score > 0)
      .sort((a, b) => b.score - a.score || a.order - b.order)
      .slice(0, query.limit);

    logger.debug(
      { requirementId: query.requirementId, candidates: segments.length, semanticHits: hits.length, returned: ranked.length },
      'Hybrid retrieval complete'
    );

    return {
      requirementId: query.requirementId,
      strategy: this.strategy,
      segments: ranked.map(({ segment, score }) => ({
        segmentId: segment.id,
        text: segment.payload.text,
        pages: segment.payload.pages,
        section: segment.payload.section ?? undefined,
        score,
      })),
    };
  }
}
