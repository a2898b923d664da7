import { describe, it, expect } from 'vitest';
import { AuditStateError, IntegrityViolationError, NotFoundError } from '../../../utils/errors.js';
import { InMemoryAuditRepository } from '../InMemoryAuditRepository.js';

const fixedClock = () => new Date('2024-05-01T10:00:00.000Z');

describe('InMemoryAuditRepository', () => {
  it('creates pending audits without a report', async () => {
    const repository = new InMemoryAuditRepository(fixedClock);

    const audit = await repository.create({ fileName: 'policy.pdf' });

    expect(audit).toMatchObject({
      fileName: 'policy.pdf',
      status: 'PENDING',
      progress: 0,
      report: null,
      createdAt: '2024-05-01T10:00:00.000Z',
    });
    expect(await repository.get(audit.id)).toEqual(audit);
  });

  it('returns null for unknown audits', async () => {
    expect(await new InMemoryAuditRepository().get('audit-missing')).toBeNull();
  });

  it('updates status and progress', async () => {
    const repository = new InMemoryAuditRepository(fixedClock);
    const audit = await repository.create({ fileName: 'policy.pdf' });

    const updated = await repository.updateState(audit.id, 'EXTRACTING', 0.1);

    expect(updated.status).toBe('EXTRACTING');
    expect(updated.progress).toBe(0.1);
  });

  it('applies a state change only while the expected status still holds', async () => {
    const repository = new InMemoryAuditRepository(fixedClock);
    const audit = await repository.create({ fileName: 'policy.pdf' });

    await repository.updateState(audit.id, 'EXTRACTING', 0.1, 'PENDING');

    await expect(repository.updateState(audit.id, 'EXTRACTING', 0.1, 'PENDING')).rejects.toThrow(
      new AuditStateError(`Audit ${audit.id} is EXTRACTING, expected PENDING`)
    );
    expect((await repository.get(audit.id))?.status).toBe('EXTRACTING');
  });

  it('stores a report only once', async () => {
    const repository = new InMemoryAuditRepository(fixedClock);
    const audit = await repository.create({ fileName: 'policy.pdf' });
    const report = { outcome: 'FAILED' as const, error: 'boom', failedAt: '2024-05-01T10:00:00.000Z' };

    await repository.saveReport(audit.id, report);

    await expect(repository.saveReport(audit.id, { ...report, error: 'again' })).rejects.toBeInstanceOf(
      IntegrityViolationError
    );
    const stored = await repository.get(audit.id);
    expect(stored?.report).toEqual(report);
    expect(Object.isFrozen(stored?.report)).toBe(true);
  });

  it('rejects writes to unknown audits', async () => {
    const repository = new InMemoryAuditRepository();

    await expect(repository.updateState('audit-missing', 'EXTRACTING', 0.1)).rejects.toBeInstanceOf(NotFoundError);
  });
});
