import type { RetrievalStrategy } from '../../domain/schemas/report.schema.js';
import type { EvidenceBundle, RetrievalQuery } from '../../types/evidence.types.js';

export interface EvidenceRetriever {
  readonly strategy: RetrievalStrategy;
  retrieve(query: RetrievalQuery): Promise<EvidenceBundle>;
}
