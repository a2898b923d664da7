import type { FastifyReply, FastifyRequest } from 'fastify';
import type { AuditRecord } from '../../domain/entities/Audit.js';
import type { OrchestrationResult } from '../../domain/schemas/report.schema.js';
import type { AuditRepository } from '../../services/audit/AuditRepository.interface.js';
import type { AuditOrchestrator, AuditSubmission } from '../../services/audit/AuditOrchestrator.js';
import type { ExplainabilityService } from '../../services/audit/ExplainabilityService.js';
import { toDocumentSegment, type SegmentInput } from '../../services/extraction/segment.schema.js';
import type { AuditSnapshotter } from '../../services/snapshot/AuditSnapshotter.js';
import { AuditStateError, NotFoundError, ValidationError, errorMessage } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import { sendError } from '../errors.js';

const log = createLogger('api');

export interface AuditParams {
  id: string;
}

export interface SubmitAuditBody {
  fileName: string;
  segments: SegmentInput[];
}

const toStatusView = (audit: AuditRecord) => ({
  id: audit.id,
  fileName: audit.fileName,
  status: audit.status,
  progress: audit.progress,
  hasReport: audit.report !== null,
  createdAt: audit.createdAt,
  updatedAt: audit.updatedAt,
});

function runInBackground({ audit, completion }: AuditSubmission): void {
  completion
    .then(outcome => log.debug({ auditId: audit.id, status: outcome.status }, 'Background audit finished'))
    .catch(error => log.error({ auditId: audit.id, error: errorMessage(error) }, 'Background audit crashed'));
}

async function requireAudit(audits: AuditRepository, id: string): Promise<AuditRecord> {
  const audit = await audits.get(id);
  if (!audit) {
    throw new NotFoundError(`Audit ${id} not found`);
  }
  return audit;
}

async function requireResult(audits: AuditRepository, id: string): Promise<OrchestrationResult> {
  const audit = await requireAudit(audits, id);
  if (audit.report?.outcome !== 'COMPLETED') {
    throw new AuditStateError(`Audit ${id} has no completed report (status ${audit.status})`);
  }
  return audit.report.result;
}

export function createSubmitAuditHandler(orchestrator: AuditOrchestrator) {
  return async (request: FastifyRequest<{ Body: SubmitAuditBody }>, reply: FastifyReply) => {
    try {
      const { fileName, segments } = request.body;
      const submission = await orchestrator.submit(fileName, {
        kind: 'segments',
        fileName,
        segments: segments.map(toDocumentSegment),
      });
      runInBackground(submission);

      log.info({ auditId: submission.audit.id, fileName, segments: segments.length }, 'Audit submitted');
      return reply.code(202).send(toStatusView(submission.audit));
    } catch (error) {
      return sendError(reply, error, 'Audit submission');
    }
  };
}

export function createUploadAuditHandler(orchestrator: AuditOrchestrator) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const data = await request.file();
      if (!data) {
        throw new ValidationError('No file uploaded');
      }

      const buffer = await data.toBuffer();
      log.info({ fileName: data.filename, size: buffer.length }, 'Received file upload');

      const submission = await orchestrator.submit(data.filename, {
        kind: 'buffer',
        fileName: data.filename,
        data: buffer,
      });
      runInBackground(submission);

      return reply.code(202).send(toStatusView(submission.audit));
    } catch (error) {
      return sendError(reply, error, 'Audit upload');
    }
  };
}

export function createAuditStatusHandler(audits: AuditRepository) {
  return async (request: FastifyRequest<{ Params: AuditParams }>, reply: FastifyReply) => {
    try {
      const audit = await requireAudit(audits, request.params.id);
      return reply.code(200).send(toStatusView(audit));
    } catch (error) {
      return sendError(reply, error, 'Audit status');
    }
  };
}

export function createAuditReportHandler(audits: AuditRepository) {
  return async (request: FastifyRequest<{ Params: AuditParams }>, reply: FastifyReply) => {
    try {
      const audit = await requireAudit(audits, request.params.id);
      if (audit.report === null) {
        throw new AuditStateError(`Audit ${audit.id} is still ${audit.status}`);
      }
      return reply.code(200).send(audit.report);
    } catch (error) {
      return sendError(reply, error, 'Audit report');
    }
  };
}

export function createAuditIntegrityHandler(audits: AuditRepository, snapshotter: AuditSnapshotter) {
  return async (request: FastifyRequest<{ Params: AuditParams }>, reply: FastifyReply) => {
    try {
      const { snapshot } = (await requireResult(audits, request.params.id)).metadata;
      return reply.code(200).send({
        auditId: request.params.id,
        fingerprint: snapshot.fingerprint,
        evidenceIntact: snapshotter.verifyIntegrity(snapshot),
        fingerprintIntact: snapshotter.verifyFingerprint(snapshot),
      });
    } catch (error) {
      return sendError(reply, error, 'Integrity check');
    }
  };
}

export function createAuditExplainHandler(audits: AuditRepository, explainability: ExplainabilityService) {
  return async (request: FastifyRequest<{ Params: AuditParams }>, reply: FastifyReply) => {
    try {
      const result = await requireResult(audits, request.params.id);
      return reply.code(200).send(await explainability.explainAudit(result));
    } catch (error) {
      return sendError(reply, error, 'Audit explanation');
    }
  };
}
