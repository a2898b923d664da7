import type { Snapshot } from '../../domain/schemas/snapshot.schema.js';
import type { Requirement } from '../../domain/entities/Requirement.js';
import { countStatuses, describeVerdictLogic } from '../audit/VerdictAggregator.js';

const STATUS_LABEL = {
  COMPLIANT: 'Compliant',
  PARTIAL: 'Partially compliant',
  NON_COMPLIANT: 'Non-compliant',
  UNKNOWN: 'Unknown',
} as const;

const escapeCell = (text: string): string => text.replace(/\|/g, '\\|').replace(/\s+/g, ' ').trim();

export function renderMarkdownReport(snapshot: Snapshot, requirements: readonly Requirement[] = []): string {
  const titles = new Map(requirements.map(requirement => [requirement.requirementId, requirement.title]));
  const breakdown = countStatuses(snapshot.results.requirements.map(result => result.status));
  const framework = [snapshot.framework.name, snapshot.framework.version].filter(Boolean).join(' ');

  const lines: string[] = [
    `# Compliance audit report`,
    '',
    `- Audit: \`${snapshot.auditId}\``,
    `- Framework: ${framework || 'unspecified'}`,
    `- Evaluated: ${snapshot.engine.evaluationDate} by ${snapshot.engine.name} ${snapshot.engine.version}`,
    `- Overall verdict: **${snapshot.results.overallVerdict}**`,
    `- Fingerprint: \`${snapshot.fingerprint}\``,
    '',
    describeVerdictLogic(snapshot.results.overallVerdict, breakdown),
    '',
    '| Requirement | Status | Confidence | Pages |',
    '| --- | --- | --- | --- |',
  ];

  for (const result of snapshot.results.requirements) {
    const title = titles.get(result.requirementId);
    const label = title ? `${result.requirementId} ${escapeCell(title)}` : result.requirementId;
    const pages = result.pageNumbers.length > 0 ? result.pageNumbers.join(', ') : '-';
    lines.push(`| ${label} | ${STATUS_LABEL[result.status]} | ${result.confidence.toFixed(2)} | ${pages} |`);
  }

  lines.push('', '## Findings', '');

  for (const result of snapshot.results.requirements) {
    lines.push(`### ${result.requirementId}: ${STATUS_LABEL[result.status]}`, '', result.reasoning, '');
    if (result.evidenceQuote) {
      lines.push(`> ${result.evidenceQuote.replace(/\n/g, '\n> ')}`, '', `Evidence hash: \`${result.evidenceHash ?? ''}\``, '');
    }
  }

  return lines.join('\n');
}
