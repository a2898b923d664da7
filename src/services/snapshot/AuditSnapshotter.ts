import { z } from 'zod';
import type { Assessment, Verdict } from '../../domain/schemas/assessment.schema.js';
import type { ExecutionTrace } from '../../domain/schemas/trace.schema.js';
import type { Snapshot, SnapshotBody } from '../../domain/schemas/snapshot.schema.js';
import type { AuditRecord } from '../../domain/entities/Audit.js';
import type { FrameworkMetadata } from '../../domain/entities/Framework.js';
import { canonicalHash, sha256 } from '../../utils/canonicalJson.js';
import { deepFreeze } from '../../utils/freeze.js';
import { IntegrityViolationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const ENGINE_NAME = 'Requirement Audit Engine';
export const ENGINE_VERSION = '1.0.0';
export const SNAPSHOT_VERSION = '1.0';

export interface SnapshotInput {
  auditId: string;
  framework: FrameworkMetadata;
  assessments: readonly Assessment[];
  overallVerdict: Verdict;
  executionTrace: ExecutionTrace;
}

const quoteHashesSchema = z.object({
  results: z.object({
    requirements: z.array(
      z.object({
        evidenceQuote: z.string().nullish(),
        evidenceHash: z.string().nullish(),
      })
    ),
  }),
});

export class AuditSnapshotter {
  constructor(
    private readonly clock: () => Date = () => new Date(),
    private readonly engine = { name: ENGINE_NAME, version: ENGINE_VERSION }
  ) {}

  /** Empty quotes have no hash. */
  hashQuote(quote: string | null | undefined): string | null {
    return quote ? sha256(quote) : null;
  }

  createFrozenSnapshot(input: SnapshotInput): Snapshot {
    const body: SnapshotBody = {
      snapshotVersion: SNAPSHOT_VERSION,
      auditId: input.auditId,
      engine: {
        name: this.engine.name,
        version: this.engine.version,
        evaluationDate: this.clock().toISOString(),
      },
      framework: {
        name: input.framework.name,
        version: input.framework.version,
        effectiveDate: input.framework.effectiveDate,
      },
      results: {
        overallVerdict: input.overallVerdict,
        requirements: input.assessments.map(assessment => ({
          requirementId: assessment.requirementId,
          status: assessment.status,
          confidence: assessment.confidence,
          reasoning: assessment.reasoning,
          evidenceQuote: assessment.evidenceQuote,
          evidenceHash: this.hashQuote(assessment.evidenceQuote),
          pageNumbers: [...assessment.pageNumbers],
        })),
      },
      metadata: {
        executionTrace: input.executionTrace,
        integrityCheckPassed: true,
      },
    };

    const snapshot: Snapshot = { ...body, fingerprint: canonicalHash(body) };

    logger.info(
      { auditId: input.auditId, fingerprint: snapshot.fingerprint, requirements: body.results.requirements.length },
      'Snapshot frozen'
    );

    return deepFreeze(snapshot);
  }

  /**
   * Recomputes every evidence hash from its quote. Only quote tampering is
   * detected here; edits to statuses, confidences or the verdict are caught
   * by {@link verifyFingerprint}.
   */
  verifyIntegrity(snapshot: unknown): boolean {
    const parsed = quoteHashesSchema.safeParse(snapshot);
    if (!parsed.success) return false;

    return parsed.data.results.requirements.every(
      requirement => this.hashQuote(requirement.evidenceQuote) === (requirement.evidenceHash ?? null)
    );
  }

  /** Recomputes the fingerprint over every field except the fingerprint itself. */
  verifyFingerprint(snapshot: object): boolean {
    const entries = Object.entries(snapshot);
    const stored = entries.find(([key]) => key === 'fingerprint')?.[1];
    if (typeof stored !== 'string') return false;

    const body = Object.fromEntries(entries.filter(([key]) => key !== 'fingerprint'));
    return canonicalHash(body) === stored;
  }

  ensureImmutability(audit: AuditRecord): void {
    if (audit.report !== null) {
      throw new IntegrityViolationError(`Audit ${audit.id} already holds a frozen report`, {
        auditId: audit.id,
        status: audit.status,
      });
    }
  }
}
