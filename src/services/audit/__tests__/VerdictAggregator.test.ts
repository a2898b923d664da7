import { describe, it, expect } from 'vitest';
import { aggregateVerdict, countStatuses, describeVerdictLogic } from '../VerdictAggregator.js';

describe('aggregateVerdict', () => {
  it('is RED when any requirement is NON_COMPLIANT', () => {
    expect(aggregateVerdict(['COMPLIANT', 'NON_COMPLIANT', 'PARTIAL'])).toBe('RED');
    expect(aggregateVerdict(['NON_COMPLIANT'])).toBe('RED');
  });

  it('is YELLOW when something is PARTIAL or UNKNOWN and nothing is NON_COMPLIANT', () => {
    expect(aggregateVerdict(['COMPLIANT', 'PARTIAL'])).toBe('YELLOW');
    expect(aggregateVerdict(['COMPLIANT', 'UNKNOWN'])).toBe('YELLOW');
    expect(aggregateVerdict(['UNKNOWN'])).toBe('YELLOW');
  });

  it('is GREEN only when every requirement is COMPLIANT', () => {
    expect(aggregateVerdict(['COMPLIANT', 'COMPLIANT'])).toBe('GREEN');
  });

  it('is YELLOW for an empty list', () => {
    expect(aggregateVerdict([])).toBe('YELLOW');
  });

  it('does not depend on order', () => {
    expect(aggregateVerdict(['UNKNOWN', 'COMPLIANT', 'NON_COMPLIANT'])).toBe(
      aggregateVerdict(['NON_COMPLIANT', 'UNKNOWN', 'COMPLIANT'])
    );
  });
});

describe('describeVerdictLogic', () => {
  it('counts the statuses behind the verdict', () => {
    const breakdown = countStatuses(['COMPLIANT', 'PARTIAL', 'UNKNOWN', 'UNKNOWN']);

    expect(breakdown).toEqual({ COMPLIANT: 1, PARTIAL: 1, NON_COMPLIANT: 0, UNKNOWN: 2 });
    expect(describeVerdictLogic('YELLOW', breakdown)).toBe(
      'YELLOW because 1 requirement(s) are PARTIAL and 2 are UNKNOWN, with none NON_COMPLIANT.'
    );
  });

  it('explains an empty evaluation', () => {
    expect(describeVerdictLogic('YELLOW', countStatuses([]))).toBe('YELLOW because no requirement was evaluated.');
  });
});
