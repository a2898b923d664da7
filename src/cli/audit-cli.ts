#!/usr/bin/env node
import { basename } from 'path';
import { config } from '../config/index.js';
import { createAuditEngine } from '../bootstrap.js';
import type { OrchestrationResult } from '../domain/schemas/report.schema.js';
import type { AssessmentStatus, Verdict } from '../domain/schemas/assessment.schema.js';
import { AuditSnapshotter } from '../services/snapshot/AuditSnapshotter.js';
import { SnapshotStorage } from '../services/snapshot/SnapshotStorage.js';
import { errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { CliUsageError, parseArgs, type CliArgs } from './args.js';
import { fmt, ProgressReporter, type Color } from './reporters/ProgressReporter.js';

const HELP = `
Requirement audit - evaluate a document against the configured requirement catalog

Usage:
  audit-cli run --file <path> [options]
  audit-cli verify --snapshot <path>

Run options:
  --file <path>         Document to audit (.pdf, .txt, .md or a .json segment list)
  --mode <mode>         agentic or single-pass (default: ${config.pipeline.evaluationMode})
  --retrieval <mode>    auto, hybrid or lexical (default: ${config.pipeline.retrieval})
  --out <dir>           Where to write the snapshot and report (default: ${config.storage.snapshotPath})
  --json                Print the full result as JSON

Examples:
  audit-cli run --file ./privacy-policy.pdf
  audit-cli run --file ./notice.md --mode single-pass --retrieval lexical
  audit-cli verify --snapshot ./data/snapshots/audit_123.snapshot.json
`;

const STATUS_COLORS: Record<AssessmentStatus, Color> = {
  COMPLIANT: 'green',
  PARTIAL: 'yellow',
  NON_COMPLIANT: 'red',
  UNKNOWN: 'dim',
};

const VERDICT_COLORS: Record<Verdict, Color> = {
  GREEN: 'green',
  YELLOW: 'yellow',
  RED: 'red',
};

const printTable = (result: OrchestrationResult) => {
  const idWidth = Math.max(14, ...result.assessments.map(a => a.requirementId.length));
  const header = `${'Requirement'.padEnd(idWidth)} | Status        | Conf | Pages`;
  const separator = '-'.repeat(header.length);

  console.log(separator);
  console.log(header);
  console.log(separator);
  for (const assessment of result.assessments) {
    const status = fmt(STATUS_COLORS[assessment.status], assessment.status.padEnd(13));
    const pages = assessment.pageNumbers.length > 0 ? assessment.pageNumbers.join(', ') : '-';
    console.log(
      `${assessment.requirementId.padEnd(idWidth)} | ${status} | ${assessment.confidence.toFixed(2)} | ${pages}`
    );
  }
  console.log(separator);
};

const printSummary = (result: OrchestrationResult) => {
  const { metadata } = result;
  console.log(`\nVerdict:     ${fmt(VERDICT_COLORS[result.overallVerdict], result.overallVerdict)}`);
  console.log(`Mode:        ${metadata.evaluationMode} (${metadata.retrievalStrategy} retrieval)`);
  console.log(`Evaluated:   ${metadata.evaluatedRequirements}/${metadata.totalRequirements} requirements`);
  if (metadata.plannerFallback) {
    console.log(fmt('yellow', 'Planner fell back to the full catalog'));
  }
  if (metadata.rejectedRequirementIds.length > 0) {
    console.log(`Rejected:    ${metadata.rejectedRequirementIds.join(', ')}`);
  }
  console.log(`Fingerprint: ${metadata.snapshot.fingerprint}`);
};

const runAudit = async (args: Extract<CliArgs, { command: 'run' }>): Promise<number> => {
  const reporter = new ProgressReporter(!args.json);
  const engine = await createAuditEngine({
    evaluationMode: args.mode,
    retrieval: args.retrieval,
    inMemoryAudits: true,
    onProgress: event => reporter.update(event),
  });

  try {
    const audit = await engine.orchestrator.createAudit(basename(args.file));
    const outcome = await engine.orchestrator.runAudit(audit.id, { kind: 'file', path: args.file });

    if (outcome.status === 'FAILED' || !outcome.result) {
      reporter.error(`Audit failed: ${outcome.error ?? 'unknown error'}`);
      return 1;
    }
    reporter.complete(`Audit ${audit.id} completed`);

    const storage = new SnapshotStorage(args.out ?? config.storage.snapshotPath);
    await storage.init();
    const stored = await storage.save(outcome.result.metadata.snapshot, await engine.catalog.listRequirements());

    if (args.json) {
      console.log(JSON.stringify({ ...outcome.result, export: stored }, null, 2));
    } else {
      console.log(`\nResults for ${audit.fileName}:\n`);
      printTable(outcome.result);
      printSummary(outcome.result);
      console.log(`\nSnapshot:    ${stored.snapshotPath}`);
      console.log(`Report:      ${stored.reportPath}`);
    }
    return 0;
  } finally {
    await engine.close();
  }
};

const verifySnapshot = async (path: string): Promise<number> => {
  const snapshotter = new AuditSnapshotter();
  const data = await new SnapshotStorage().load(path);

  const evidenceIntact = snapshotter.verifyIntegrity(data);
  const fingerprintIntact = typeof data === 'object' && data !== null && snapshotter.verifyFingerprint(data);

  const mark = (ok: boolean) => (ok ? fmt('green', 'intact') : fmt('red', 'TAMPERED'));
  console.log(`Evidence hashes: ${mark(evidenceIntact)}`);
  console.log(`Fingerprint:     ${mark(fingerprintIntact)}`);

  return evidenceIntact && fingerprintIntact ? 0 : 2;
};

const main = async (): Promise<number> => {
  const args = parseArgs(process.argv.slice(2));

  switch (args.command) {
    case 'help':
      console.log(HELP);
      return 0;
    case 'run':
      return runAudit(args);
    case 'verify':
      return verifySnapshot(args.snapshot);
  }
};

main()
  .then(code => process.exit(code))
  .catch(error => {
    if (error instanceof CliUsageError) {
      console.error(`Error: ${error.message}`);
      console.log(HELP);
      process.exit(1);
    }
    logger.error({ error: errorMessage(error) }, 'audit-cli failed');
    console.error('Error:', errorMessage(error));
    process.exit(1);
  });
