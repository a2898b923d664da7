import type { AssessmentStatus } from '../schemas/assessment.schema.js';

/** NON_COMPLIANT and UNKNOWN share the floor: neither supports compliance. */
const STATUS_RANK: Record<AssessmentStatus, number> = {
  COMPLIANT: 2,
  PARTIAL: 1,
  NON_COMPLIANT: 0,
  UNKNOWN: 0,
};

export const statusRank = (status: AssessmentStatus): number => STATUS_RANK[status];

export function isUpgrade(from: AssessmentStatus, to: AssessmentStatus): boolean {
  return STATUS_RANK[to] > STATUS_RANK[from];
}

export interface ClampedJudgement {
  status: AssessmentStatus;
  confidence: number;
  rejections: string[];
}

/**
 * Bounds a proposed re-judgement by the original one: the status may not
 * rank higher and the confidence may not exceed the original.
 */
export function clampToOriginal(
  original: { status: AssessmentStatus; confidence: number },
  proposed: { status: AssessmentStatus; confidence: number }
): ClampedJudgement {
  const rejections: string[] = [];
  let status = proposed.status;
  let confidence = proposed.confidence;

  if (isUpgrade(original.status, proposed.status)) {
    rejections.push(`Rejected status upgrade ${original.status} -> ${proposed.status}`);
    status = original.status;
  }
  if (confidence > original.confidence) {
    rejections.push(`Rejected confidence increase ${original.confidence} -> ${proposed.confidence}`);
    confidence = original.confidence;
  }

  return { status, confidence, rejections };
}
