import Fastify, { type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import { registerRoutes, type RouteDependencies } from './api/routes.js';
import { healthResponseSchema } from './api/schemas/common.schema.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('http');

export interface ServerDependencies extends RouteDependencies {
  maxUploadBytes: number;
  healthChecks?: Record<string, () => Promise<boolean>>;
}

export async function buildServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: false });

  await fastify.register(multipart, {
    limits: {
      fileSize: deps.maxUploadBytes,
      files: 1,
    },
  });

  fastify.addHook('onResponse', async (request, reply) => {
    log.debug(
      { method: request.method, url: request.url, statusCode: reply.statusCode, ms: reply.elapsedTime },
      'Request completed'
    );
  });

  fastify.get('/health', {
    schema: { response: { 200: healthResponseSchema } },
    handler: async () => {
      const entries = await Promise.all(
        Object.entries(deps.healthChecks ?? {}).map(async ([name, check]) => {
          const ok = await check().catch(() => false);
          return [name, ok] as const;
        })
      );
      const checks = Object.fromEntries(entries);

      return {
        status: entries.every(([, ok]) => ok) ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        checks,
      };
    },
  });

  await registerRoutes(fastify, deps);

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({ error: 'VALIDATION_ERROR', message: error.message });
    }
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    if (statusCode === 500) {
      log.error({ error: error.message, url: request.url }, 'Request error');
    }
    return reply.code(statusCode).send({
      error: error.code ?? 'INTERNAL_ERROR',
      message: error.message,
    });
  });

  return fastify;
}
