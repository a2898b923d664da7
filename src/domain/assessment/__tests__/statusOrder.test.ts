import { describe, it, expect } from 'vitest';
import { clampToOriginal, isUpgrade, statusRank } from '../statusOrder.js';

describe('statusRank', () => {
  it('ranks NON_COMPLIANT and UNKNOWN at the floor', () => {
    expect(statusRank('COMPLIANT')).toBe(2);
    expect(statusRank('PARTIAL')).toBe(1);
    expect(statusRank('NON_COMPLIANT')).toBe(0);
    expect(statusRank('UNKNOWN')).toBe(0);
  });

  it('treats moves between floor statuses as non-upgrades', () => {
    expect(isUpgrade('UNKNOWN', 'NON_COMPLIANT')).toBe(false);
    expect(isUpgrade('NON_COMPLIANT', 'UNKNOWN')).toBe(false);
    expect(isUpgrade('PARTIAL', 'COMPLIANT')).toBe(true);
  });

  it('treats any move from the floor to COMPLIANT as an upgrade', () => {
    expect(isUpgrade('UNKNOWN', 'COMPLIANT')).toBe(true);
    expect(isUpgrade('NON_COMPLIANT', 'COMPLIANT')).toBe(true);
    expect(isUpgrade('UNKNOWN', 'PARTIAL')).toBe(true);
    expect(isUpgrade('NON_COMPLIANT', 'PARTIAL')).toBe(true);
  });
});

describe('clampToOriginal', () => {
  it('rejects a status upgrade and keeps the original status', () => {
    const clamped = clampToOriginal({ status: 'PARTIAL', confidence: 0.6 }, { status: 'COMPLIANT', confidence: 0.5 });

    expect(clamped.status).toBe('PARTIAL');
    expect(clamped.confidence).toBe(0.5);
    expect(clamped.rejections).toEqual(['Rejected status upgrade PARTIAL -> COMPLIANT']);
  });

  it('caps confidence at the original value', () => {
    const clamped = clampToOriginal({ status: 'COMPLIANT', confidence: 0.7 }, { status: 'PARTIAL', confidence: 0.95 });

    expect(clamped.status).toBe('PARTIAL');
    expect(clamped.confidence).toBe(0.7);
    expect(clamped.rejections).toEqual(['Rejected confidence increase 0.7 -> 0.95']);
  });

  it('accepts a downgrade unchanged', () => {
    expect(
      clampToOriginal({ status: 'COMPLIANT', confidence: 0.9 }, { status: 'NON_COMPLIANT', confidence: 0.4 })
    ).toEqual({ status: 'NON_COMPLIANT', confidence: 0.4, rejections: [] });
  });
});
