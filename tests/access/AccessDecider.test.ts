import { describe, expect, it } from 'vitest';
import { decide, nextState, stateOf } from '../../src/services/access/AccessDecider';
import type { AccessDecision, AccessState } from '../../src/services/access/AccessDecider';

const THRESHOLD = 500;
const THRESHOLDS = [1, 500, 1000];

type Case = [AccessState, number, number, boolean, AccessDecision];

function casesFor(threshold: number): Case[] {
  const below = [...new Set([0, threshold - 1])];
  const reached = [threshold, threshold + 1];
  const cases: Case[] = [];

  for (const total of below) {
    cases.push(
      ['LOCKED', total, threshold, false, 'HOLD'],
      ['UNLOCKED', total, threshold, false, 'HOLD'],
      ['LOCKED', total, threshold, true, 'REVOKE'],
      ['UNLOCKED', total, threshold, true, 'REVOKE'],
    );
  }
  for (const total of reached) {
    cases.push(
      ['LOCKED', total, threshold, false, 'GRANT'],
      ['UNLOCKED', total, threshold, false, 'HOLD'],
      ['LOCKED', total, threshold, true, 'REVOKE'],
      ['UNLOCKED', total, threshold, true, 'REVOKE'],
    );
  }
  return cases;
}

describe('AccessDecider', () => {
  const cases = THRESHOLDS.flatMap(casesFor);

  it('covers every state, boundary and threshold edge', () => {
    // threshold 1 has no distinct total below it other than 0
    expect(cases).toHaveLength(12 + 16 + 16);
  });

  it.each(cases)(
    '%s with %i of %i words (boundary fired: %s) decides %s',
    (state, totalWords, threshold, boundaryFired, expected) => {
      expect(decide({ state, totalWords, threshold, boundaryFired })).toBe(expected);
    },
  );

  it('treats a missing boundary flag as not fired', () => {
    expect(decide({ state: 'LOCKED', totalWords: 500, threshold: THRESHOLD })).toBe('GRANT');
  });

  it('maps the stored flag to a state', () => {
    expect(stateOf(true)).toBe('UNLOCKED');
    expect(stateOf(false)).toBe('LOCKED');
  });

  it('moves between states only on GRANT and REVOKE', () => {
    expect(nextState('LOCKED', 'GRANT')).toBe('UNLOCKED');
    expect(nextState('UNLOCKED', 'REVOKE')).toBe('LOCKED');
    expect(nextState('LOCKED', 'REVOKE')).toBe('LOCKED');
    expect(nextState('UNLOCKED', 'HOLD')).toBe('UNLOCKED');
    expect(nextState('LOCKED', 'HOLD')).toBe('LOCKED');
  });
});
