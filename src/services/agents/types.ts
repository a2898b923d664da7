import type { Requirement, RequirementSummary } from '../../domain/entities/Requirement.js';
import type { Assessment, VerifiedAssessment } from '../../domain/schemas/assessment.schema.js';
import type { EvidenceBundle, RequirementPlan } from '../../types/evidence.types.js';

export interface PlanningContext {
  frameworkName: string | null;
  documentName?: string;
}

export interface PlanningAgent {
  plan(requirements: readonly RequirementSummary[], context: PlanningContext): Promise<RequirementPlan>;
}

export interface AssessmentAgent {
  assess(requirement: Requirement, evidence: EvidenceBundle): Promise<Assessment>;
}

export interface VerificationAgent {
  verify(assessment: Assessment, evidence: EvidenceBundle): Promise<VerifiedAssessment>;
}
