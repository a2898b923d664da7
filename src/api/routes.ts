import type { FastifyInstance } from 'fastify';
import type { AuditRepository } from '../services/audit/AuditRepository.interface.js';
import type { AuditOrchestrator } from '../services/audit/AuditOrchestrator.js';
import type { ExplainabilityService } from '../services/audit/ExplainabilityService.js';
import type { RequirementCatalog } from '../services/catalog/RequirementCatalog.interface.js';
import type { AuditSnapshotter } from '../services/snapshot/AuditSnapshotter.js';
import {
  createAuditExplainHandler,
  createAuditIntegrityHandler,
  createAuditReportHandler,
  createAuditStatusHandler,
  createSubmitAuditHandler,
  createUploadAuditHandler,
  type AuditParams,
  type SubmitAuditBody,
} from './handlers/audit.handler.js';
import { createFrameworkHandler } from './handlers/framework.handler.js';
import {
  auditParamsSchema,
  auditStatusResponseSchema,
  integrityResponseSchema,
  submitAuditBodySchema,
} from './schemas/audit.schema.js';
import { errorResponseSchema } from './schemas/common.schema.js';

export interface RouteDependencies {
  orchestrator: AuditOrchestrator;
  audits: AuditRepository;
  catalog: RequirementCatalog;
  snapshotter: AuditSnapshotter;
  explainability: ExplainabilityService;
}

export async function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies) {
  fastify.get('/framework', {
    handler: createFrameworkHandler(deps.catalog),
  });

  fastify.post<{ Body: SubmitAuditBody }>('/audits', {
    schema: {
      body: submitAuditBodySchema,
      response: {
        202: auditStatusResponseSchema,
        400: errorResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: createSubmitAuditHandler(deps.orchestrator),
  });

  fastify.post('/audits/upload', {
    schema: {
      response: {
        202: auditStatusResponseSchema,
        400: errorResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: createUploadAuditHandler(deps.orchestrator),
  });

  fastify.get<{ Params: AuditParams }>('/audits/:id', {
    schema: {
      params: auditParamsSchema,
      response: {
        200: auditStatusResponseSchema,
        404: errorResponseSchema,
      },
    },
    handler: createAuditStatusHandler(deps.audits),
  });

  // The report is a nested, versioned document; it is sent without a response schema.
  fastify.get<{ Params: AuditParams }>('/audits/:id/report', {
    schema: { params: auditParamsSchema },
    handler: createAuditReportHandler(deps.audits),
  });

  fastify.get<{ Params: AuditParams }>('/audits/:id/integrity', {
    schema: {
      params: auditParamsSchema,
      response: {
        200: integrityResponseSchema,
        404: errorResponseSchema,
        409: errorResponseSchema,
      },
    },
    handler: createAuditIntegrityHandler(deps.audits, deps.snapshotter),
  });

  fastify.get<{ Params: AuditParams }>('/audits/:id/explain', {
    schema: { params: auditParamsSchema },
    handler: createAuditExplainHandler(deps.audits, deps.explainability),
  });
}
