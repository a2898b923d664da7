import type { AssessmentStatus, Verdict } from '../../domain/schemas/assessment.schema.js';

export type StatusBreakdown = Record<AssessmentStatus, number>;

export function countStatuses(statuses: readonly AssessmentStatus[]): StatusBreakdown {
  const breakdown: StatusBreakdown = { COMPLIANT: 0, PARTIAL: 0, NON_COMPLIANT: 0, UNKNOWN: 0 };
  for (const status of statuses) {
    breakdown[status] += 1;
  }
  return breakdown;
}

/**
 * RED on any NON_COMPLIANT, else YELLOW on any PARTIAL or UNKNOWN, else GREEN.
 * An empty list is YELLOW: nothing has been shown to be compliant.
 */
export function aggregateVerdict(statuses: readonly AssessmentStatus[]): Verdict {
  if (statuses.length === 0) return 'YELLOW';

  const breakdown = countStatuses(statuses);
  if (breakdown.NON_COMPLIANT > 0) return 'RED';
  if (breakdown.PARTIAL > 0 || breakdown.UNKNOWN > 0) return 'YELLOW';
  return 'GREEN';
}

export function describeVerdictLogic(verdict: Verdict, breakdown: StatusBreakdown): string {
  switch (verdict) {
    case 'RED':
      return `RED because ${breakdown.NON_COMPLIANT} requirement(s) are NON_COMPLIANT.`;
    case 'YELLOW':
      if (breakdown.PARTIAL + breakdown.UNKNOWN === 0) {
        return 'YELLOW because no requirement was evaluated.';
      }
      return `YELLOW because ${breakdown.PARTIAL} requirement(s) are PARTIAL and ${breakdown.UNKNOWN} are UNKNOWN, with none NON_COMPLIANT.`;
    case 'GREEN':
      return `GREEN because all ${breakdown.COMPLIANT} evaluated requirement(s) are COMPLIANT.`;
  }
}
