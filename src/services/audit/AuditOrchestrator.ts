import pLimit from 'p-limit';
import type { AuditRecord, AuditStatus } from '../../domain/entities/Audit.js';
import type { FrameworkMetadata } from '../../domain/entities/Framework.js';
import type { Requirement } from '../../domain/entities/Requirement.js';
import { advanceProgress, canTransition, isTerminal, PROGRESS_CHECKPOINTS } from '../../domain/lifecycle/transitions.js';
import type { Assessment } from '../../domain/schemas/assessment.schema.js';
import type { OrchestrationResult } from '../../domain/schemas/report.schema.js';
import type { EvaluationMode } from '../../config/validation.js';
import type { DocumentSource, EvidenceBundle, RequirementPlan } from '../../types/evidence.types.js';
import { AuditStateError, ConfigurationError, NotFoundError, errorMessage } from '../../utils/errors.js';
import { deepFreeze } from '../../utils/freeze.js';
import { createLogger } from '../../utils/logger.js';
import type { AssessmentAgent, PlanningAgent, VerificationAgent } from '../agents/types.js';
import type { RequirementCatalog } from '../catalog/RequirementCatalog.interface.js';
import type { DocumentExtractor } from '../extraction/DocumentExtractor.interface.js';
import type { DocumentIndex } from '../indexing/DocumentIndex.interface.js';
import { ExecutionTracer } from '../observability/ExecutionTracer.js';
import { LatencyTracker } from '../observability/LatencyTracker.js';
import type { EvidenceRetriever } from '../retrieval/EvidenceRetriever.interface.js';
import { requirementKeywords } from '../retrieval/keywords.js';
import { ENGINE_VERSION, type AuditSnapshotter } from '../snapshot/AuditSnapshotter.js';
import type { AuditRepository } from './AuditRepository.interface.js';
import { filterPlan } from './filterPlan.js';
import { aggregateVerdict } from './VerdictAggregator.js';

const log = createLogger('orchestrator');

export interface AuditProgressEvent {
  auditId: string;
  status: AuditStatus;
  progress: number;
}

export interface OrchestratorDependencies {
  catalog: RequirementCatalog;
  audits: AuditRepository;
  extractor: DocumentExtractor;
  documentIndex: DocumentIndex;
  retriever: EvidenceRetriever;
  planner: PlanningAgent;
  assessor: AssessmentAgent;
  verifier: VerificationAgent;
  snapshotter: AuditSnapshotter;
  onProgress?: (event: AuditProgressEvent) => void;
  clock?: () => Date;
}

export interface OrchestratorPipelineConfig {
  evaluationMode: EvaluationMode;
  topK: number;
  concurrency: number;
}

export interface AuditRunResult {
  auditId: string;
  status: 'COMPLETED' | 'FAILED';
  result?: OrchestrationResult;
  error?: string;
}

export interface AuditSubmission {
  audit: AuditRecord;
  completion: Promise<AuditRunResult>;
}

export class AuditOrchestrator {
  private readonly clock: () => Date;

  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly pipeline: OrchestratorPipelineConfig
  ) {
    this.clock = deps.clock ?? (() => new Date());
  }

  get evaluationMode(): EvaluationMode {
    return this.pipeline.evaluationMode;
  }

  async createAudit(fileName: string): Promise<AuditRecord> {
    const audit = await this.deps.audits.create({ fileName });
    log.info({ auditId: audit.id, fileName }, 'Audit created');
    this.emit(audit);
    return audit;
  }

  /** Creates the audit and starts it without waiting for the outcome. */
  async submit(fileName: string, source: DocumentSource): Promise<AuditSubmission> {
    const audit = await this.createAudit(fileName);
    return { audit, completion: this.runAudit(audit.id, source) };
  }

  /**
   * Runs a PENDING audit to COMPLETED or FAILED. The PENDING -> EXTRACTING
   * move claims the audit, so of two concurrent runs only one proceeds.
   * A missing audit or a lost claim rejects; pipeline failures resolve
   * with status FAILED.
   */
  async runAudit(auditId: string, source: DocumentSource): Promise<AuditRunResult> {
    const initial = await this.deps.audits.get(auditId);
    if (!initial) {
      throw new NotFoundError(`Audit ${auditId} not found`);
    }
    if (initial.status !== 'PENDING') {
      throw new AuditStateError(`Audit ${auditId} is ${initial.status} and cannot be run again`, {
        auditId,
        status: initial.status,
      });
    }

    let current = await this.transition(initial, 'EXTRACTING', PROGRESS_CHECKPOINTS.EXTRACTING);
    try {
      const requirements = await this.deps.catalog.listRequirements();
      if (requirements.length === 0) {
        throw new ConfigurationError('The requirement catalog is empty');
      }
      const framework = await this.deps.catalog.getFramework();

      let result: OrchestrationResult;
      try {
        const segments = await this.deps.extractor.extract(source);
        await this.deps.documentIndex.index(auditId, segments);
        log.info({ auditId, segments: segments.length }, 'Document indexed');

        current = await this.transition(current, 'ANALYZING', PROGRESS_CHECKPOINTS.ANALYZING);
        result = await this.evaluateRequirements(auditId, requirements, framework);
      } finally {
        await this.releaseIndex(auditId);
      }
      current = await this.transition(current, 'ANALYZING', PROGRESS_CHECKPOINTS.EVALUATED);

      const latest = await this.deps.audits.get(auditId);
      if (latest) this.deps.snapshotter.ensureImmutability(latest);
      await this.deps.audits.saveReport(auditId, { outcome: 'COMPLETED', result });
      current = await this.transition(current, 'COMPLETED', PROGRESS_CHECKPOINTS.COMPLETED);

      log.info({ auditId, verdict: result.overallVerdict }, 'Audit completed');
      return { auditId, status: 'COMPLETED', result };
    } catch (error) {
      const message = errorMessage(error);
      log.error({ auditId, error: message }, 'Audit failed');
      await this.markFailed(auditId, message);
      return { auditId, status: 'FAILED', error: message };
    }
  }

  async evaluateRequirements(
    auditId: string,
    requirements: readonly Requirement[],
    framework: FrameworkMetadata
  ): Promise<OrchestrationResult> {
    const latency = new LatencyTracker();
    const tracer = new ExecutionTracer(latency, this.clock);
    const agentic = this.pipeline.evaluationMode === 'agentic';

    const plan: RequirementPlan = agentic
      ? await this.planRequirements(requirements, framework, latency, tracer)
      : { requirementIds: requirements.map(r => r.requirementId), reasoning: null, fallback: false };

    const filtered = filterPlan(plan.requirementIds, requirements);
    if (filtered.rejectedIds.length > 0) {
      log.warn({ auditId, rejectedIds: filtered.rejectedIds }, 'Planner returned identifiers outside the catalog');
    }
    let selected = filtered.selected;
    if (selected.length === 0) {
      log.warn({ auditId }, 'Filtered plan is empty, evaluating the whole catalog');
      selected = [...requirements];
    }

    const limit = pLimit(this.pipeline.concurrency);
    const assessments = await Promise.all(
      selected.map(requirement => limit(() => this.evaluateRequirement(auditId, requirement, latency, tracer)))
    );

    const overallVerdict = aggregateVerdict(assessments.map(assessment => assessment.status));
    const executionTrace = tracer.getFullTrace();
    const snapshot = this.deps.snapshotter.createFrozenSnapshot({
      auditId,
      framework,
      assessments,
      overallVerdict,
      executionTrace,
    });

    return deepFreeze({
      assessments,
      overallVerdict,
      metadata: {
        evaluatedAt: this.clock().toISOString(),
        evaluationMode: this.pipeline.evaluationMode,
        retrievalStrategy: this.deps.retriever.strategy,
        totalRequirements: requirements.length,
        evaluatedRequirements: assessments.length,
        plannerFallback: plan.fallback,
        plannerReasoning: plan.reasoning,
        rejectedRequirementIds: filtered.rejectedIds,
        engineVersion: ENGINE_VERSION,
        totalLatencyMs: latency.total(),
        latencies: latency.getAll(),
        executionTrace,
        snapshot,
      },
    });
  }

  private async planRequirements(
    requirements: readonly Requirement[],
    framework: FrameworkMetadata,
    latency: LatencyTracker,
    tracer: ExecutionTracer
  ): Promise<RequirementPlan> {
    const startedAt = this.clock();
    const summaries = requirements.map(({ requirementId, title, riskLevel }) => ({ requirementId, title, riskLevel }));
    const plan = await latency.measure('planner', () =>
      this.deps.planner.plan(summaries, { frameworkName: framework.name })
    );

    tracer.recordAgentExecution({
      agentName: 'planner',
      startedAt,
      durationMs: latency.get('planner') ?? 0,
      input: { requirements: summaries },
      output: { requirementIds: plan.requirementIds, reasoning: plan.reasoning, fallback: plan.fallback },
    });

    return plan;
  }

  /** Runs retrieval, assessment and verification for one requirement; never rejects. */
  private async evaluateRequirement(
    auditId: string,
    requirement: Requirement,
    latency: LatencyTracker,
    tracer: ExecutionTracer
  ): Promise<Assessment> {
    const { requirementId } = requirement;
    const startedAt = Date.now();
    let bundle: EvidenceBundle | null = null;
    let assessment: Assessment | null = null;

    try {
      bundle = await latency.measure(`retrieval:${requirementId}`, () =>
        this.deps.retriever.retrieve({
          auditId,
          requirementId,
          query: requirement.text,
          keywords: requirementKeywords(requirement),
          limit: this.pipeline.topK,
        })
      );
      const evidence = bundle;

      assessment = await latency.measure(`assessment:${requirementId}`, () =>
        this.deps.assessor.assess(requirement, evidence)
      );
      const assessed = assessment;

      if (this.pipeline.evaluationMode !== 'agentic') {
        this.recordEvaluation(tracer, assessed, assessed, bundle, null, startedAt);
        return assessed;
      }

      const verified = await latency.measure(`verification:${requirementId}`, () =>
        this.deps.verifier.verify(assessed, evidence)
      );

      const changed =
        !verified.approved ||
        verified.verifiedStatus !== assessed.status ||
        verified.verifiedConfidence !== assessed.confidence;
      const final: Assessment = changed
        ? { ...assessed, status: verified.verifiedStatus, confidence: verified.verifiedConfidence }
        : assessed;

      if (changed) {
        log.info(
          { auditId, requirementId, from: assessed.status, to: final.status, approved: verified.approved },
          'Verifier adjusted assessment'
        );
      }

      this.recordEvaluation(tracer, assessed, final, bundle, verified.verificationNotes, startedAt, {
        status: verified.verifiedStatus,
        confidence: verified.verifiedConfidence,
      });
      return final;
    } catch (error) {
      const message = errorMessage(error);
      log.error({ auditId, requirementId, error: message }, 'Requirement evaluation failed');

      const failed: Assessment = {
        requirementId,
        status: 'UNKNOWN',
        confidence: 0,
        evidenceQuote: null,
        reasoning: `Evaluation failed: ${message}`,
        pageNumbers: [],
      };
      this.recordEvaluation(tracer, assessment ?? failed, failed, bundle, null, startedAt, undefined, message);
      return failed;
    }
  }

  private recordEvaluation(
    tracer: ExecutionTracer,
    assessed: Assessment,
    final: Assessment,
    bundle: EvidenceBundle | null,
    notes: string | null,
    startedAt: number,
    verified?: { status: Assessment['status']; confidence: number },
    error?: string
  ): void {
    tracer.recordRequirementEvaluation({
      requirementId: final.requirementId,
      retrievalStrategy: bundle?.strategy ?? this.deps.retriever.strategy,
      evidenceSegments: bundle?.segments.length ?? 0,
      assessmentStatus: assessed.status,
      assessmentConfidence: assessed.confidence,
      verifiedStatus: verified?.status ?? null,
      verifiedConfidence: verified?.confidence ?? null,
      finalStatus: final.status,
      finalConfidence: final.confidence,
      verificationNotes: notes,
      durationMs: Math.max(0, Date.now() - startedAt),
      error: error ?? null,
    });
  }

  private async transition(audit: AuditRecord, status: AuditStatus, progress: number): Promise<AuditRecord> {
    if (status !== audit.status && !canTransition(audit.status, status)) {
      throw new AuditStateError(`Illegal transition ${audit.status} -> ${status}`, { auditId: audit.id });
    }
    const updated = await this.deps.audits.updateState(
      audit.id,
      status,
      advanceProgress(audit.progress, progress),
      audit.status
    );
    this.emit(updated);
    return updated;
  }

  private async releaseIndex(auditId: string): Promise<void> {
    try {
      await this.deps.documentIndex.release(auditId);
    } catch (error) {
      log.warn({ auditId, error: errorMessage(error) }, 'Could not release indexed segments');
    }
  }

  private async markFailed(auditId: string, message: string): Promise<void> {
    try {
      const latest = await this.deps.audits.get(auditId);
      if (!latest) {
        throw new NotFoundError(`Audit ${auditId} not found`);
      }
      if (isTerminal(latest.status) || latest.report !== null) {
        log.warn(
          { auditId, status: latest.status, hasReport: latest.report !== null },
          'Audit already settled, failure not recorded'
        );
        return;
      }

      const failed = await this.deps.audits.updateState(auditId, 'FAILED', latest.progress, latest.status);
      this.emit(failed);
      await this.deps.audits.saveReport(auditId, {
        outcome: 'FAILED',
        error: message,
        failedAt: this.clock().toISOString(),
      });
    } catch (error) {
      log.error({ auditId, error: errorMessage(error) }, 'Could not record audit failure');
    }
  }

  private emit(audit: AuditRecord): void {
    try {
      this.deps.onProgress?.({ auditId: audit.id, status: audit.status, progress: audit.progress });
    } catch (error) {
      log.warn({ auditId: audit.id, error: errorMessage(error) }, 'Progress listener failed');
    }
  }
}
