import type { AuditRecord, AuditStatus } from '../../domain/entities/Audit.js';
import type { AuditReport } from '../../domain/schemas/report.schema.js';
import { AuditStateError, IntegrityViolationError, NotFoundError } from '../../utils/errors.js';
import { deepFreeze } from '../../utils/freeze.js';
import { generateId } from '../../utils/ids.js';
import type { AuditRepository } from './AuditRepository.interface.js';

export class InMemoryAuditRepository implements AuditRepository {
  private readonly audits = new Map<string, AuditRecord>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async create(input: { fileName: string }): Promise<AuditRecord> {
    const now = this.clock().toISOString();
    const audit: AuditRecord = {
      id: generateId('audit'),
      fileName: input.fileName,
      status: 'PENDING',
      progress: 0,
      report: null,
      createdAt: now,
      updatedAt: now,
    };
    this.audits.set(audit.id, audit);
    return { ...audit };
  }

  async get(id: string): Promise<AuditRecord | null> {
    const audit = this.audits.get(id);
    return audit ? { ...audit } : null;
  }

  async updateState(
    id: string,
    status: AuditStatus,
    progress: number,
    expectedStatus?: AuditStatus
  ): Promise<AuditRecord> {
    const audit = this.require(id);
    if (expectedStatus !== undefined && audit.status !== expectedStatus) {
      throw new AuditStateError(`Audit ${id} is ${audit.status}, expected ${expectedStatus}`, {
        auditId: id,
        status: audit.status,
        expectedStatus,
      });
    }
    const updated: AuditRecord = { ...audit, status, progress, updatedAt: this.clock().toISOString() };
    this.audits.set(id, updated);
    return { ...updated };
  }

  async saveReport(id: string, report: AuditReport): Promise<void> {
    const audit = this.require(id);
    if (audit.report !== null) {
      throw new IntegrityViolationError(`Audit ${id} already has a report`);
    }
    this.audits.set(id, { ...audit, report: deepFreeze(report), updatedAt: this.clock().toISOString() });
  }

  private require(id: string): AuditRecord {
    const audit = this.audits.get(id);
    if (!audit) {
      throw new NotFoundError(`Audit ${id} not found`);
    }
    return audit;
  }
}
