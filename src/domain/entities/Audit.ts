import type { AuditReport } from '../schemas/report.schema.js';

export const AUDIT_STATUSES = ['PENDING', 'EXTRACTING', 'ANALYZING', 'COMPLETED', 'FAILED'] as const;
export type AuditStatus = (typeof AUDIT_STATUSES)[number];

export interface AuditRecord {
  id: string;
  fileName: string;
  status: AuditStatus;
  progress: number;
  report: AuditReport | null;
  createdAt: string;
  updatedAt: string;
}
