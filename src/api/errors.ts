import type { FastifyReply } from 'fastify';
import {
  AuditStateError,
  ConfigurationError,
  ExtractionError,
  NotFoundError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('api');

function statusCodeOf(error: unknown): number {
  if (error instanceof NotFoundError) return 404;
  if (error instanceof AuditStateError) return 409;
  if (error instanceof ValidationError || error instanceof ExtractionError) return 400;
  if (error instanceof ConfigurationError) return 500;
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return 500;
}

function codeOf(error: unknown, statusCode: number): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return statusCode === 500 ? 'INTERNAL_ERROR' : 'REQUEST_ERROR';
}

export function sendError(reply: FastifyReply, error: unknown, context: string) {
  const statusCode = statusCodeOf(error);
  if (statusCode >= 500) {
    log.error({ error: errorMessage(error) }, `${context} failed`);
  } else {
    log.debug({ error: errorMessage(error), statusCode }, `${context} rejected`);
  }

  return reply.code(statusCode).send({
    error: codeOf(error, statusCode),
    message: errorMessage(error),
  });
}
