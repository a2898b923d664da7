import type { AuditRecord, AuditStatus } from '../../domain/entities/Audit.js';
import type { AuditReport } from '../../domain/schemas/report.schema.js';

export interface AuditRepository {
  create(input: { fileName: string }): Promise<AuditRecord>;
  get(id: string): Promise<AuditRecord | null>;
  /**
   * Moves the audit to `status`. With `expectedStatus` the write is a
   * compare-and-set: it fails with AuditStateError unless the stored status
   * still equals it.
   */
  updateState(id: string, status: AuditStatus, progress: number, expectedStatus?: AuditStatus): Promise<AuditRecord>;
  /** Stores the report once; a second write fails with IntegrityViolationError. */
  saveReport(id: string, report: AuditReport): Promise<void>;
}
