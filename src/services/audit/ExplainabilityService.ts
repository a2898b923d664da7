import { riskRank, type Requirement, type RiskLevel } from '../../domain/entities/Requirement.js';
import type { Assessment, AssessmentStatus, Verdict } from '../../domain/schemas/assessment.schema.js';
import type { OrchestrationResult } from '../../domain/schemas/report.schema.js';
import type { ExecutionTrace, RequirementEvaluationTrace } from '../../domain/schemas/trace.schema.js';
import { NotFoundError } from '../../utils/errors.js';
import type { RequirementCatalog } from '../catalog/RequirementCatalog.interface.js';
import { aggregateVerdict, countStatuses, describeVerdictLogic, type StatusBreakdown } from './VerdictAggregator.js';

export interface RequirementExplanation {
  requirementId: string;
  title: string | null;
  sectionRef: string | null;
  riskLevel: RiskLevel | null;
  status: AssessmentStatus;
  confidence: number;
  reasoning: string;
  evidenceQuote: string | null;
  pageNumbers: number[];
  wasDowngraded: boolean;
  verificationNotes: string | null;
}

export interface VerdictExplanation {
  verdict: Verdict;
  breakdown: StatusBreakdown;
  verdictLogic: string;
  recomputedVerdict: Verdict;
  consistent: boolean;
}

export interface FailedRequirement {
  requirementId: string;
  title: string | null;
  riskLevel: RiskLevel | null;
  status: 'NON_COMPLIANT' | 'PARTIAL';
  confidence: number;
  reasoning: string;
}

export interface AuditExplanation {
  verdict: VerdictExplanation;
  requirements: RequirementExplanation[];
  failedRequirements: FailedRequirement[];
}

const isFailure = (assessment: Assessment): assessment is Assessment & { status: 'NON_COMPLIANT' | 'PARTIAL' } =>
  assessment.status === 'NON_COMPLIANT' || assessment.status === 'PARTIAL';

const rankOf = (level: RiskLevel | null): number => (level ? riskRank(level) : -1);

/**
 * Read-only views over a finished audit. Requirements missing from the
 * catalog (for example after it changed) are still explained, without
 * their title or risk level.
 */
export class ExplainabilityService {
  constructor(private readonly catalog: RequirementCatalog) {}

  async explainAudit(result: OrchestrationResult): Promise<AuditExplanation> {
    const requirements = await this.requirementsById();
    const trace = result.metadata.executionTrace;

    return {
      verdict: this.explainVerdict(result),
      requirements: result.assessments.map(assessment =>
        this.describe(assessment, requirements.get(assessment.requirementId), trace)
      ),
      failedRequirements: this.failures(result, requirements),
    };
  }

  async explainRequirement(result: OrchestrationResult, requirementId: string): Promise<RequirementExplanation> {
    const assessment = result.assessments.find(candidate => candidate.requirementId === requirementId);
    if (!assessment) {
      throw new NotFoundError(`Requirement ${requirementId} was not evaluated in this audit`);
    }
    const requirements = await this.requirementsById();
    return this.describe(assessment, requirements.get(requirementId), result.metadata.executionTrace);
  }

  explainVerdict(result: OrchestrationResult): VerdictExplanation {
    const statuses = result.assessments.map(assessment => assessment.status);
    const breakdown = countStatuses(statuses);
    const recomputedVerdict = aggregateVerdict(statuses);

    return {
      verdict: result.overallVerdict,
      breakdown,
      verdictLogic: describeVerdictLogic(recomputedVerdict, breakdown),
      recomputedVerdict,
      consistent: recomputedVerdict === result.overallVerdict,
    };
  }

  getEvidenceChain(requirementId: string, trace: ExecutionTrace): RequirementEvaluationTrace | null {
    return trace.requirementEvaluations[requirementId] ?? null;
  }

  /** NON_COMPLIANT and PARTIAL requirements, highest risk first. */
  async listFailedRequirements(result: OrchestrationResult): Promise<FailedRequirement[]> {
    return this.failures(result, await this.requirementsById());
  }

  private failures(result: OrchestrationResult, requirements: Map<string, Requirement>): FailedRequirement[] {
    const failed = result.assessments.filter(isFailure).map(assessment => {
      const requirement = requirements.get(assessment.requirementId);
      return {
        requirementId: assessment.requirementId,
        title: requirement?.title ?? null,
        riskLevel: requirement?.riskLevel ?? null,
        status: assessment.status,
        confidence: assessment.confidence,
        reasoning: assessment.reasoning,
      };
    });

    return failed.sort((a, b) => rankOf(b.riskLevel) - rankOf(a.riskLevel));
  }

  private describe(
    assessment: Assessment,
    requirement: Requirement | undefined,
    trace: ExecutionTrace
  ): RequirementExplanation {
    const evaluation = this.getEvidenceChain(assessment.requirementId, trace);
    return {
      requirementId: assessment.requirementId,
      title: requirement?.title ?? null,
      sectionRef: requirement?.sectionRef ?? null,
      riskLevel: requirement?.riskLevel ?? null,
      status: assessment.status,
      confidence: assessment.confidence,
      reasoning: assessment.reasoning,
      evidenceQuote: assessment.evidenceQuote,
      pageNumbers: [...assessment.pageNumbers],
      wasDowngraded: evaluation?.wasDowngraded ?? false,
      verificationNotes: evaluation?.verificationNotes ?? null,
    };
  }

  private async requirementsById(): Promise<Map<string, Requirement>> {
    const requirements = await this.catalog.listRequirements();
    return new Map(requirements.map(requirement => [requirement.requirementId, requirement]));
  }
}
