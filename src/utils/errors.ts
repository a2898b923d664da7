export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends Error {
  code = 'CONFIGURATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ExtractionError extends Error {
  code = 'EXTRACTION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ExtractionError';
  }
}

export class LLMCallError extends Error {
  code = 'LLM_CALL_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'LLMCallError';
  }
}

export class LLMResponseError extends Error {
  code = 'LLM_RESPONSE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'LLMResponseError';
  }
}

export class IntegrityViolationError extends Error {
  code = 'INTEGRITY_VIOLATION';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'IntegrityViolationError';
  }
}

export class AuditStateError extends Error {
  code = 'INVALID_AUDIT_STATE';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'AuditStateError';
  }
}

export class NotFoundError extends Error {
  code = 'NOT_FOUND';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class GraphPersistenceError extends Error {
  code = 'GRAPH_PERSISTENCE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'GraphPersistenceError';
  }
}

export class DocumentStorageError extends Error {
  code = 'DOCUMENT_STORAGE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'DocumentStorageError';
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
