import { describe, it, expect } from 'vitest';
import type { AuditRecord, AuditStatus } from '../../../domain/entities/Audit.js';
import type { EvidenceRetriever } from '../../retrieval/EvidenceRetriever.interface.js';
import { PLANNER_FALLBACK_REASONING } from '../../agents/RequirementPlanner.js';
import { VectorDocumentIndex } from '../../indexing/VectorDocumentIndex.js';
import { InMemoryDocumentIndex } from '../../indexing/InMemoryDocumentIndex.js';
import { HybridEvidenceRetriever } from '../../retrieval/HybridEvidenceRetriever.js';
import { LexicalEvidenceRetriever } from '../../retrieval/LexicalEvidenceRetriever.js';
import { InMemoryVectorStore } from '../../vector/InMemoryVectorStore.js';
import { InMemoryAuditRepository } from '../InMemoryAuditRepository.js';
import { AuditStateError, NotFoundError } from '../../../utils/errors.js';
import { FakeLLMService } from '../../../testing/FakeLLMService.js';
import { HashingEmbedder } from '../../../testing/HashingEmbedder.js';
import {
  CONSENT_QUOTE,
  RETENTION_QUOTE,
  TEST_NOW,
  createTestOrchestrator,
  policySource,
  scriptPolicyReview,
} from '../../../testing/createTestOrchestrator.js';

/** Loses its connection when asked to mark an audit COMPLETED. */
class CompletionFailingRepository extends InMemoryAuditRepository {
  async updateState(
    id: string,
    status: AuditStatus,
    progress: number,
    expectedStatus?: AuditStatus
  ): Promise<AuditRecord> {
    if (status === 'COMPLETED') {
      throw new Error('connection reset');
    }
    return super.updateState(id, status, progress, expectedStatus);
  }
}

describe('AuditOrchestrator', () => {
  /* ============= agentic run ============= */

  it('runs an audit through planning, assessment and verification', async () => {
    const { orchestrator, audits, events, snapshotter } = createTestOrchestrator({
      llm: scriptPolicyReview(new FakeLLMService()),
    });
    const audit = await orchestrator.createAudit('policy.json');

    const run = await orchestrator.runAudit(audit.id, policySource());

    expect(run.status).toBe('COMPLETED');
    const result = run.result;
    if (!result) throw new Error('expected a result');

    expect(result.overallVerdict).toBe('RED');
    expect(result.assessments).toEqual([
      {
        requirementId: 'REQ-1',
        status: 'COMPLIANT',
        confidence: 0.9,
        evidenceQuote: CONSENT_QUOTE,
        reasoning: 'Consent is obtained before collection.',
        pageNumbers: [1],
      },
      {
        requirementId: 'REQ-2',
        status: 'NON_COMPLIANT',
        confidence: 0.6,
        evidenceQuote: RETENTION_QUOTE,
        reasoning: 'Data is kept indefinitely with no erasure path.',
        pageNumbers: [2],
      },
    ]);
    expect(result.metadata).toMatchObject({
      evaluatedAt: '2024-05-01T10:00:00.000Z',
      evaluationMode: 'agentic',
      retrievalStrategy: 'lexical',
      totalRequirements: 2,
      evaluatedRequirements: 2,
      plannerFallback: false,
      plannerReasoning: 'Both obligations apply.',
      rejectedRequirementIds: ['REQ-99'],
    });
    expect(Object.keys(result.metadata.latencies)).toEqual(
      expect.arrayContaining(['planner', 'retrieval:REQ-1', 'assessment:REQ-2', 'verification:REQ-2'])
    );

    const stored = await audits.get(audit.id);
    expect(stored?.status).toBe('COMPLETED');
    expect(stored?.progress).toBe(1);
    expect(stored?.report?.outcome).toBe('COMPLETED');
    expect(events.map(event => [event.status, event.progress])).toEqual([
      ['PENDING', 0],
      ['EXTRACTING', 0.1],
      ['ANALYZING', 0.4],
      ['ANALYZING', 0.8],
      ['COMPLETED', 1],
    ]);

    expect(snapshotter.verifyIntegrity(result.metadata.snapshot)).toBe(true);
    expect(snapshotter.verifyFingerprint(result.metadata.snapshot)).toBe(true);
    expect(Object.isFrozen(result.assessments[0])).toBe(true);
  });

  it('records each requirement chain in the execution trace', async () => {
    const { orchestrator } = createTestOrchestrator({ llm: scriptPolicyReview(new FakeLLMService()) });
    const audit = await orchestrator.createAudit('policy.json');

    const { result } = await orchestrator.runAudit(audit.id, policySource());
    const trace = result?.metadata.executionTrace;

    expect(trace?.agents.planner).toMatchObject({ agentName: 'planner', success: true, error: null });
    expect(trace?.requirementEvaluations['REQ-2']).toMatchObject({
      retrievalStrategy: 'lexical',
      evidenceSegments: 2,
      assessmentStatus: 'NON_COMPLIANT',
      assessmentConfidence: 0.8,
      verifiedStatus: 'NON_COMPLIANT',
      verifiedConfidence: 0.6,
      finalStatus: 'NON_COMPLIANT',
      finalConfidence: 0.6,
      wasDowngraded: true,
      verificationNotes: 'Retention alone does not show a refusal to erase.',
      error: null,
    });
    expect(trace?.requirementEvaluations['REQ-1']?.wasDowngraded).toBe(false);
  });

  it('submits an audit and resolves its completion in the background', async () => {
    const { orchestrator } = createTestOrchestrator({ llm: scriptPolicyReview(new FakeLLMService()) });

    const { audit, completion } = await orchestrator.submit('policy.json', policySource());

    expect(audit.status).toBe('PENDING');
    expect((await completion).status).toBe('COMPLETED');
  });

  /* ============= planning ============= */

  it('evaluates only the planned requirements', async () => {
    const llm = scriptPolicyReview(new FakeLLMService().on('planner', { requirement_ids: ['REQ-2'] }));
    const { orchestrator } = createTestOrchestrator({ llm });
    const audit = await orchestrator.createAudit('policy.json');

    const { result } = await orchestrator.runAudit(audit.id, policySource());

    expect(result?.assessments.map(assessment => assessment.requirementId)).toEqual(['REQ-2']);
    expect(result?.metadata.totalRequirements).toBe(2);
    expect(result?.metadata.evaluatedRequirements).toBe(1);
    expect(llm.callsFor('assessment')).toHaveLength(1);
  });

  it('falls back to the whole catalog when the plan names no known requirement', async () => {
    const llm = scriptPolicyReview(new FakeLLMService().on('planner', { requirement_ids: ['REQ-99', 'REQ-100'] }));
    const { orchestrator } = createTestOrchestrator({ llm });
    const audit = await orchestrator.createAudit('policy.json');

    const { result } = await orchestrator.runAudit(audit.id, policySource());

    expect(result?.assessments.map(assessment => assessment.requirementId)).toEqual(['REQ-1', 'REQ-2']);
    expect(result?.metadata.rejectedRequirementIds).toEqual(['REQ-99', 'REQ-100']);
  });

  it('evaluates every requirement when the planner fails', async () => {
    const llm = scriptPolicyReview(new FakeLLMService().on('planner', new Error('timeout')));
    const { orchestrator } = createTestOrchestrator({ llm });
    const audit = await orchestrator.createAudit('policy.json');

    const { result } = await orchestrator.runAudit(audit.id, policySource());

    expect(result?.metadata.plannerFallback).toBe(true);
    expect(result?.metadata.plannerReasoning).toBe(PLANNER_FALLBACK_REASONING);
    expect(result?.metadata.evaluatedRequirements).toBe(2);
  });

  /* ============= single pass ============= */

  it('skips planning and verification in single-pass mode', async () => {
    const llm = scriptPolicyReview(new FakeLLMService());
    const { orchestrator } = createTestOrchestrator({ llm, mode: 'single-pass' });
    const audit = await orchestrator.createAudit('policy.json');

    const { result } = await orchestrator.runAudit(audit.id, policySource());

    expect(llm.callsFor('planner')).toHaveLength(0);
    expect(llm.callsFor('verification')).toHaveLength(0);
    expect(result?.metadata.plannerReasoning).toBeNull();
    expect(result?.assessments.map(assessment => [assessment.status, assessment.confidence])).toEqual([
      ['COMPLIANT', 0.9],
      ['NON_COMPLIANT', 0.8],
    ]);
  });

  it('never reports GREEN when a compliance claim cites text missing from the document', async () => {
    const llm = new FakeLLMService()
      .on(
        'assessment',
        { status: 'COMPLIANT', confidence: 0.9, evidence_quote: CONSENT_QUOTE, reasoning: 'Consent is explicit.' },
        'Requirement REQ-1 ('
      )
      .on(
        'assessment',
        {
          status: 'COMPLIANT',
          confidence: 0.95,
          evidence_quote: 'We erase personal data within 30 days of a request.',
          reasoning: 'Erasure is promised.',
        },
        'Requirement REQ-2 ('
      );
    const { orchestrator } = createTestOrchestrator({ llm, mode: 'single-pass' });
    const audit = await orchestrator.createAudit('policy.json');

    const { result } = await orchestrator.runAudit(audit.id, policySource());

    expect(result?.overallVerdict).toBe('YELLOW');
    expect(result?.assessments[1]).toMatchObject({
      requirementId: 'REQ-2',
      status: 'UNKNOWN',
      confidence: 0.3,
      evidenceQuote: null,
    });
  });

  /* ============= failures ============= */

  it('turns a failed model call into an UNKNOWN assessment and still completes', async () => {
    const llm = new FakeLLMService()
      .on('planner', { requirement_ids: ['REQ-1', 'REQ-2'] })
      .on('assessment', new Error('rate limited'), 'Requirement REQ-2 (')
      .on(
        'assessment',
        { status: 'COMPLIANT', confidence: 0.9, evidence_quote: CONSENT_QUOTE, reasoning: 'Consent is explicit.' },
        'Requirement REQ-1 ('
      )
      .on('verification', { verified_status: 'COMPLIANT', verified_confidence: 0.9, approved: true });
    const { orchestrator, audits } = createTestOrchestrator({ llm });
    const audit = await orchestrator.createAudit('policy.json');

    const run = await orchestrator.runAudit(audit.id, policySource());

    expect(run.status).toBe('COMPLETED');
    expect(run.result?.overallVerdict).toBe('YELLOW');
    expect(run.result?.assessments[1]).toEqual({
      requirementId: 'REQ-2',
      status: 'UNKNOWN',
      confidence: 0,
      evidenceQuote: null,
      reasoning: 'Assessment failed due to error: rate limited',
      pageNumbers: [],
    });
    expect(llm.callsFor('verification')).toHaveLength(1);
    expect((await audits.get(audit.id))?.status).toBe('COMPLETED');
  });

  it('isolates a requirement whose evidence retrieval throws', async () => {
    const documentIndex = new InMemoryDocumentIndex();
    const lexical = new LexicalEvidenceRetriever(documentIndex);
    const retriever: EvidenceRetriever = {
      strategy: 'lexical',
      retrieve: async query => {
        if (query.requirementId === 'REQ-2') throw new Error('index offline');
        return lexical.retrieve(query);
      },
    };
    const { orchestrator } = createTestOrchestrator({
      llm: scriptPolicyReview(new FakeLLMService()),
      documentIndex,
      retriever,
    });
    const audit = await orchestrator.createAudit('policy.json');

    const { result } = await orchestrator.runAudit(audit.id, policySource());

    expect(result?.assessments[0]?.status).toBe('COMPLIANT');
    expect(result?.assessments[1]).toEqual({
      requirementId: 'REQ-2',
      status: 'UNKNOWN',
      confidence: 0,
      evidenceQuote: null,
      reasoning: 'Evaluation failed: index offline',
      pageNumbers: [],
    });
    expect(result?.metadata.executionTrace.requirementEvaluations['REQ-2']).toMatchObject({
      evidenceSegments: 0,
      finalStatus: 'UNKNOWN',
      error: 'index offline',
    });
  });

  it('fails the audit when the catalog is empty', async () => {
    const { orchestrator, audits } = createTestOrchestrator({ requirements: [] });
    const audit = await orchestrator.createAudit('policy.json');

    const run = await orchestrator.runAudit(audit.id, policySource());

    expect(run).toEqual({ auditId: audit.id, status: 'FAILED', error: 'The requirement catalog is empty' });
    const stored = await audits.get(audit.id);
    expect(stored?.status).toBe('FAILED');
    expect(stored?.report).toEqual({
      outcome: 'FAILED',
      error: 'The requirement catalog is empty',
      failedAt: '2024-05-01T10:00:00.000Z',
    });
  });

  it('fails the audit when no text can be extracted', async () => {
    const { orchestrator, audits, events } = createTestOrchestrator({ llm: scriptPolicyReview(new FakeLLMService()) });
    const audit = await orchestrator.createAudit('policy.json');

    const run = await orchestrator.runAudit(audit.id, policySource([{ text: '   ', pages: [1] }]));

    expect(run.status).toBe('FAILED');
    expect(run.error).toBe('No text could be extracted from policy.json');
    const stored = await audits.get(audit.id);
    expect(stored?.status).toBe('FAILED');
    expect(stored?.progress).toBe(0.1);
    expect(events.map(event => event.status)).toEqual(['PENDING', 'EXTRACTING', 'FAILED']);
  });

  it('refuses to run an audit twice', async () => {
    const { orchestrator } = createTestOrchestrator({ llm: scriptPolicyReview(new FakeLLMService()) });
    const audit = await orchestrator.createAudit('policy.json');
    await orchestrator.runAudit(audit.id, policySource());

    await expect(orchestrator.runAudit(audit.id, policySource())).rejects.toBeInstanceOf(AuditStateError);
  });

  it('lets only one of two concurrent runs claim the audit', async () => {
    const { orchestrator, audits, llm } = createTestOrchestrator({ llm: scriptPolicyReview(new FakeLLMService()) });
    const audit = await orchestrator.createAudit('policy.json');

    const [first, second] = await Promise.allSettled([
      orchestrator.runAudit(audit.id, policySource()),
      orchestrator.runAudit(audit.id, policySource()),
    ]);

    if (first.status !== 'fulfilled' || second.status !== 'rejected') {
      throw new Error('expected the first run to claim the audit');
    }
    expect(first.value.status).toBe('COMPLETED');
    expect(second.reason).toBeInstanceOf(AuditStateError);
    const stored = await audits.get(audit.id);
    expect(stored?.status).toBe('COMPLETED');
    expect(stored?.report?.outcome).toBe('COMPLETED');
    expect(llm.callsFor('assessment')).toHaveLength(2);
  });

  it('keeps a saved report when a later step fails', async () => {
    const audits = new CompletionFailingRepository(() => TEST_NOW);
    const { orchestrator } = createTestOrchestrator({ llm: scriptPolicyReview(new FakeLLMService()), audits });
    const audit = await orchestrator.createAudit('policy.json');

    const run = await orchestrator.runAudit(audit.id, policySource());

    expect(run).toEqual({ auditId: audit.id, status: 'FAILED', error: 'connection reset' });
    const stored = await audits.get(audit.id);
    expect(stored?.status).toBe('ANALYZING');
    expect(stored?.progress).toBe(0.8);
    expect(stored?.report?.outcome).toBe('COMPLETED');
  });

  it('completes the audit even when the progress listener throws', async () => {
    const { orchestrator, audits, events } = createTestOrchestrator({
      llm: scriptPolicyReview(new FakeLLMService()),
      onProgress: () => {
        throw new Error('listener gone');
      },
    });
    const audit = await orchestrator.createAudit('policy.json');

    const run = await orchestrator.runAudit(audit.id, policySource());

    expect(run.status).toBe('COMPLETED');
    expect((await audits.get(audit.id))?.status).toBe('COMPLETED');
    expect(events.map(event => event.status)).toEqual(['PENDING', 'EXTRACTING', 'ANALYZING', 'ANALYZING', 'COMPLETED']);
  });

  it('releases indexed segments once the audit finishes', async () => {
    const { orchestrator, documentIndex } = createTestOrchestrator({ llm: scriptPolicyReview(new FakeLLMService()) });
    const audit = await orchestrator.createAudit('policy.json');

    const run = await orchestrator.runAudit(audit.id, policySource());

    expect(run.status).toBe('COMPLETED');
    expect(await documentIndex.listSegments(audit.id)).toEqual([]);
  });

  it('rejects unknown audits', async () => {
    const { orchestrator } = createTestOrchestrator();

    await expect(orchestrator.runAudit('audit-missing', policySource())).rejects.toBeInstanceOf(NotFoundError);
  });

  /* ============= hybrid retrieval ============= */

  it('runs over a vector index with hybrid retrieval', async () => {
    const store = new InMemoryVectorStore();
    const embedder = new HashingEmbedder();
    const { orchestrator } = createTestOrchestrator({
      llm: scriptPolicyReview(new FakeLLMService()),
      documentIndex: new VectorDocumentIndex(store, embedder),
      retriever: new HybridEvidenceRetriever(store, embedder),
    });
    const audit = await orchestrator.createAudit('policy.json');

    const { result } = await orchestrator.runAudit(audit.id, policySource());

    expect(embedder.batches[0]).toEqual([CONSENT_QUOTE, RETENTION_QUOTE]);
    expect(result?.metadata.retrievalStrategy).toBe('hybrid');
    expect(result?.assessments.map(assessment => assessment.status)).toEqual(['COMPLIANT', 'NON_COMPLIANT']);
    expect(await store.listByDocumentId(audit.id)).toEqual([]);
  });
});
