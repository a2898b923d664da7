export const RISK_LEVELS = ['LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export interface Requirement {
  requirementId: string;
  title: string;
  text: string;
  sectionRef: string;
  riskLevel: RiskLevel;
}

export type RequirementSummary = Pick<Requirement, 'requirementId' | 'title' | 'riskLevel'>;

export const riskRank = (level: RiskLevel): number => RISK_LEVELS.indexOf(level);

/** Highest risk first; ties keep their incoming order. */
export function byDescendingRisk<T extends { riskLevel: RiskLevel }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => riskRank(b.riskLevel) - riskRank(a.riskLevel));
}
