import { AUDIT_STATUSES, type AuditRecord, type AuditStatus } from '../../domain/entities/Audit.js';
import { auditReportSchema, type AuditReport } from '../../domain/schemas/report.schema.js';
import { AuditStateError, GraphPersistenceError, IntegrityViolationError, NotFoundError } from '../../utils/errors.js';
import { generateId } from '../../utils/ids.js';
import { logger } from '../../utils/logger.js';
import type { Neo4jClient } from '../graph/Neo4jClient.js';
import { nodeProperties, toJsNumber, toNullableString, toStringValue } from '../graph/values.js';
import type { AuditRepository } from './AuditRepository.interface.js';

function toAuditStatus(value: unknown): AuditStatus {
  const status = AUDIT_STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new GraphPersistenceError(`Unknown audit status ${String(value)}`);
  }
  return status;
}

function toReport(raw: string | null): AuditReport | null {
  if (raw === null) return null;
  const parsed = auditReportSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new GraphPersistenceError('Stored audit report is malformed', parsed.error.issues);
  }
  return parsed.data;
}

function toAuditRecord(node: unknown): AuditRecord {
  const props = nodeProperties(node);
  return {
    id: toStringValue(props.id),
    fileName: toStringValue(props.fileName),
    status: toAuditStatus(props.status),
    progress: toJsNumber(props.progress),
    report: toReport(toNullableString(props.report)),
    createdAt: toStringValue(props.createdAt),
    updatedAt: toStringValue(props.updatedAt),
  };
}

export class Neo4jAuditRepository implements AuditRepository {
  constructor(private readonly client: Neo4jClient) {}

  async create(input: { fileName: string }): Promise<AuditRecord> {
    const now = new Date().toISOString();
    try {
      const result = await this.client.run(
        `
        CREATE (a:Audit {
          id: $id, fileName: $fileName, status: 'PENDING', progress: 0.0,
          report: null, createdAt: $now, updatedAt: $now
        })
        RETURN a
      `,
        { id: generateId('audit'), fileName: input.fileName, now }
      );
      return toAuditRecord(result.records[0]?.get('a'));
    } catch (error) {
      logger.error({ error, fileName: input.fileName }, 'Failed to create audit');
      throw new GraphPersistenceError('Audit creation failed', error);
    }
  }

  async get(id: string): Promise<AuditRecord | null> {
    try {
      const result = await this.client.run('MATCH (a:Audit {id: $id}) RETURN a', { id });
      const record = result.records[0];
      return record ? toAuditRecord(record.get('a')) : null;
    } catch (error) {
      logger.error({ error, auditId: id }, 'Failed to read audit');
      throw new GraphPersistenceError('Audit lookup failed', error);
    }
  }

  async updateState(
    id: string,
    status: AuditStatus,
    progress: number,
    expectedStatus?: AuditStatus
  ): Promise<AuditRecord> {
    const result = await this.client
      .run(
        `
        MATCH (a:Audit {id: $id})
        WITH a, ($expected IS NULL OR a.status = $expected) AS writable
        FOREACH (_ IN CASE WHEN writable THEN [1] ELSE [] END |
          SET a.status = $status, a.progress = $progress, a.updatedAt = $now)
        RETURN a, writable
      `,
        { id, status, progress, expected: expectedStatus ?? null, now: new Date().toISOString() }
      )
      .catch((error: unknown) => {
        logger.error({ error, auditId: id, status }, 'Failed to update audit state');
        throw new GraphPersistenceError('Audit state update failed', error);
      });

    const record = result.records[0];
    if (!record) {
      throw new NotFoundError(`Audit ${id} not found`);
    }
    const audit = toAuditRecord(record.get('a'));
    if (record.get('writable') !== true) {
      throw new AuditStateError(`Audit ${id} is ${audit.status}, expected ${expectedStatus}`, {
        auditId: id,
        status: audit.status,
        expectedStatus,
      });
    }
    return audit;
  }

  async saveReport(id: string, report: AuditReport): Promise<void> {
    const result = await this.client
      .run(
        `
        MATCH (a:Audit {id: $id})
        WITH a, a.report IS NULL AS writable
        FOREACH (_ IN CASE WHEN writable THEN [1] ELSE [] END |
          SET a.report = $report, a.updatedAt = $now)
        RETURN writable
      `,
        { id, report: JSON.stringify(report), now: new Date().toISOString() }
      )
      .catch((error: unknown) => {
        logger.error({ error, auditId: id }, 'Failed to save audit report');
        throw new GraphPersistenceError('Audit report save failed', error);
      });

    const record = result.records[0];
    if (!record) {
      throw new NotFoundError(`Audit ${id} not found`);
    }
    if (record.get('writable') !== true) {
      throw new IntegrityViolationError(`Audit ${id} already has a report`);
    }
  }
}
