import { config } from './config/index.js';
import { buildServer } from './app.js';
import { createAuditEngine, type AuditEngine } from './bootstrap.js';
import { errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

async function start(): Promise<void> {
  logger.info({ evaluationMode: config.pipeline.evaluationMode }, 'Starting audit service');

  const engine: AuditEngine = await createAuditEngine();
  const fastify = await buildServer({
    orchestrator: engine.orchestrator,
    audits: engine.audits,
    catalog: engine.catalog,
    snapshotter: engine.snapshotter,
    explainability: engine.explainability,
    healthChecks: engine.healthChecks,
    maxUploadBytes: config.storage.maxUploadSizeMB * 1024 * 1024,
  });

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, 'Shutting down');
    try {
      await fastify.close();
      await engine.close();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  await fastify.listen({ port: config.server.port, host: '0.0.0.0' });
  logger.info(
    { port: config.server.port, retrieval: engine.retrievalStrategy, auditBackend: config.storage.auditBackend },
    'Server listening'
  );
}

start().catch(error => {
  logger.fatal({ error: errorMessage(error) }, 'Startup failed');
  process.exit(1);
});
