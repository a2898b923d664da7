import type { AuditStatus } from '../entities/Audit.js';

export interface TransitionRule {
  from: AuditStatus;
  to: AuditStatus[];
}

export const transitionRules: TransitionRule[] = [
  { from: 'PENDING', to: ['EXTRACTING', 'FAILED'] },
  { from: 'EXTRACTING', to: ['ANALYZING', 'FAILED'] },
  { from: 'ANALYZING', to: ['COMPLETED', 'FAILED'] },
  { from: 'COMPLETED', to: [] },
  { from: 'FAILED', to: [] },
];

export const PROGRESS_CHECKPOINTS = {
  PENDING: 0,
  EXTRACTING: 0.1,
  ANALYZING: 0.4,
  EVALUATED: 0.8,
  COMPLETED: 1,
} as const;

export function canTransition(from: AuditStatus, to: AuditStatus): boolean {
  return transitionRules.some(rule => rule.from === from && rule.to.includes(to));
}

export function isTerminal(status: AuditStatus): boolean {
  return status === 'COMPLETED' || status === 'FAILED';
}

/** Progress never moves backwards and stays within [0, 1]. */
export function advanceProgress(current: number, next: number): number {
  return Math.min(1, Math.max(current, next));
}
