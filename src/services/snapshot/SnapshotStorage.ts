import { mkdir, writeFile, readFile } from 'fs/promises';
import { join } from 'path';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';
import { DocumentStorageError } from '../../utils/errors.js';
import type { Snapshot } from '../../domain/schemas/snapshot.schema.js';
import type { Requirement } from '../../domain/entities/Requirement.js';
import { renderMarkdownReport } from './renderMarkdownReport.js';

export interface StoredSnapshot {
  snapshotPath: string;
  reportPath: string;
  fingerprint: string;
}

export class SnapshotStorage {
  constructor(private readonly basePath: string = config.storage.snapshotPath) {}

  async init(): Promise<void> {
    try {
      await mkdir(this.basePath, { recursive: true });
      logger.info({ path: this.basePath }, 'Snapshot storage initialized');
    } catch (error) {
      logger.error({ error, path: this.basePath }, 'Failed to initialize snapshot storage');
      throw new DocumentStorageError('Snapshot storage initialization failed', error);
    }
  }

  async save(snapshot: Snapshot, requirements: readonly Requirement[] = []): Promise<StoredSnapshot> {
    const safeId = snapshot.auditId.replace(/[^a-zA-Z0-9._-]/g, '_');
    const snapshotPath = join(this.basePath, `${safeId}.snapshot.json`);
    const reportPath = join(this.basePath, `${safeId}.report.md`);

    try {
      await writeFile(snapshotPath, JSON.stringify(snapshot, null, 2), 'utf-8');
      await writeFile(reportPath, renderMarkdownReport(snapshot, requirements), 'utf-8');

      logger.debug({ auditId: snapshot.auditId, snapshotPath, reportPath }, 'Snapshot exported');

      return { snapshotPath, reportPath, fingerprint: snapshot.fingerprint };
    } catch (error) {
      logger.error({ error, auditId: snapshot.auditId }, 'Failed to export snapshot');
      throw new DocumentStorageError('Snapshot export failed', error);
    }
  }

  /** Returns the stored JSON as-is so verification sees exactly what is on disk. */
  async load(path: string): Promise<unknown> {
    try {
      const content = await readFile(path, 'utf-8');
      return JSON.parse(content);
    } catch (error) {
      logger.error({ error, path }, 'Failed to read snapshot');
      throw new DocumentStorageError(`Snapshot could not be read from ${path}`, error);
    }
  }
}
