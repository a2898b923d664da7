import type { AuditProgressEvent } from '../../services/audit/AuditOrchestrator.js';
import type { AuditStatus } from '../../domain/entities/Audit.js';

const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

export type Color = keyof typeof COLORS;

export const fmt = (color: Color, text: string): string => `${COLORS[color]}${text}${COLORS.reset}`;

const STATUS_LABELS: Record<AuditStatus, string> = {
  PENDING: 'Queued',
  EXTRACTING: 'Extracting document',
  ANALYZING: 'Evaluating requirements',
  COMPLETED: 'Completed',
  FAILED: 'Failed',
};

export class ProgressReporter {
  private enabled: boolean;
  private lastLineLength = 0;

  constructor(enabled: boolean = true) {
    this.enabled = enabled && process.stdout.isTTY === true;
  }

  update(event: AuditProgressEvent): void {
    if (!this.enabled) return;

    this.clearLine();
    const percent = fmt('cyan', `[${Math.round(event.progress * 100).toString().padStart(3)}%]`);
    const line = `${percent} ${STATUS_LABELS[event.status]}`;
    process.stdout.write(line);
    this.lastLineLength = line.length;
  }

  complete(message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    console.log(fmt('green', '✓') + ` ${message}`);
  }

  error(message: string): void {
    this.clearLine();
    console.error(fmt('red', '✗') + ` ${message}`);
  }

  private clearLine(): void {
    if (this.lastLineLength > 0) {
      process.stdout.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
      this.lastLineLength = 0;
    }
  }
}
