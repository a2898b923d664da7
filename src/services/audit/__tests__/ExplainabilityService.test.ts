import { beforeAll, describe, it, expect } from 'vitest';
import type { OrchestrationResult } from '../../../domain/schemas/report.schema.js';
import { NotFoundError } from '../../../utils/errors.js';
import { FakeLLMService } from '../../../testing/FakeLLMService.js';
import { makeAssessment } from '../../../testing/builders.js';
import {
  RETENTION_QUOTE,
  createTestOrchestrator,
  policySource,
  scriptPolicyReview,
} from '../../../testing/createTestOrchestrator.js';
import { ExplainabilityService } from '../ExplainabilityService.js';

describe('ExplainabilityService', () => {
  let result: OrchestrationResult;
  let explainability: ExplainabilityService;

  beforeAll(async () => {
    const { orchestrator, catalog } = createTestOrchestrator({ llm: scriptPolicyReview(new FakeLLMService()) });
    const audit = await orchestrator.createAudit('policy.json');
    const run = await orchestrator.runAudit(audit.id, policySource());
    if (!run.result) throw new Error(`audit did not complete: ${run.error}`);
    result = run.result;
    explainability = new ExplainabilityService(catalog);
  });

  it('explains the verdict from the status breakdown', () => {
    expect(explainability.explainVerdict(result)).toEqual({
      verdict: 'RED',
      breakdown: { COMPLIANT: 1, PARTIAL: 0, NON_COMPLIANT: 1, UNKNOWN: 0 },
      verdictLogic: 'RED because 1 requirement(s) are NON_COMPLIANT.',
      recomputedVerdict: 'RED',
      consistent: true,
    });
  });

  it('flags a stored verdict that no longer matches the assessments', () => {
    const tampered = structuredClone(result);
    tampered.overallVerdict = 'GREEN';

    const explanation = explainability.explainVerdict(tampered);

    expect(explanation.consistent).toBe(false);
    expect(explanation.recomputedVerdict).toBe('RED');
  });

  it('joins an assessment with its catalog entry and verification trace', async () => {
    expect(await explainability.explainRequirement(result, 'REQ-2')).toEqual({
      requirementId: 'REQ-2',
      title: 'Erasure on request',
      sectionRef: 'Section 8',
      riskLevel: 'CRITICAL',
      status: 'NON_COMPLIANT',
      confidence: 0.6,
      reasoning: 'Data is kept indefinitely with no erasure path.',
      evidenceQuote: RETENTION_QUOTE,
      pageNumbers: [2],
      wasDowngraded: true,
      verificationNotes: 'Retention alone does not show a refusal to erase.',
    });
  });

  it('rejects requirements that were not evaluated', async () => {
    await expect(explainability.explainRequirement(result, 'REQ-42')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('returns the evidence chain recorded for a requirement', () => {
    const trace = result.metadata.executionTrace;

    expect(explainability.getEvidenceChain('REQ-1', trace)?.finalStatus).toBe('COMPLIANT');
    expect(explainability.getEvidenceChain('REQ-42', trace)).toBeNull();
  });

  it('lists failed requirements by descending risk', async () => {
    const mixed = structuredClone(result);
    mixed.assessments = [
      makeAssessment({ requirementId: 'REQ-1', status: 'PARTIAL', confidence: 0.5 }),
      makeAssessment({ requirementId: 'REQ-3', status: 'COMPLIANT' }),
      makeAssessment({ requirementId: 'REQ-9', status: 'PARTIAL', confidence: 0.4 }),
      makeAssessment({ requirementId: 'REQ-2', status: 'NON_COMPLIANT', confidence: 0.7 }),
    ];

    const failed = await explainability.listFailedRequirements(mixed);

    expect(failed.map(entry => [entry.requirementId, entry.riskLevel, entry.status])).toEqual([
      ['REQ-2', 'CRITICAL', 'NON_COMPLIANT'],
      ['REQ-1', 'HIGH', 'PARTIAL'],
      ['REQ-9', null, 'PARTIAL'],
    ]);
  });

  it('explains a whole audit in assessment order', async () => {
    const explanation = await explainability.explainAudit(result);

    expect(explanation.requirements.map(entry => entry.requirementId)).toEqual(['REQ-1', 'REQ-2']);
    expect(explanation.failedRequirements.map(entry => entry.requirementId)).toEqual(['REQ-2']);
    expect(explanation.verdict.verdict).toBe('RED');
  });
});
