import type { FrameworkMetadata } from '../../domain/entities/Framework.js';
import type { Requirement } from '../../domain/entities/Requirement.js';

export interface RequirementCatalog {
  getFramework(): Promise<FrameworkMetadata>;
  /** Stable catalog order; audits report results in this order. */
  listRequirements(): Promise<Requirement[]>;
}
