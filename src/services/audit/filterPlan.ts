import type { Requirement } from '../../domain/entities/Requirement.js';

export interface FilteredPlan {
  /** Planned requirements that exist in the catalog, in catalog order, once each. */
  selected: Requirement[];
  /** Planned identifiers absent from the catalog. */
  rejectedIds: string[];
}

export function filterPlan(plannedIds: readonly string[], catalog: readonly Requirement[]): FilteredPlan {
  const planned = new Set(plannedIds);
  const known = new Set(catalog.map(requirement => requirement.requirementId));

  return {
    selected: catalog.filter(
      (requirement, index) =>
        planned.has(requirement.requirementId) &&
        catalog.findIndex(other => other.requirementId === requirement.requirementId) === index
    ),
    rejectedIds: [...planned].filter(id => !known.has(id)),
  };
}
