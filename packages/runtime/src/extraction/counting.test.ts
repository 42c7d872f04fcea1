// Tests for frequency counting and scoring

import { describe, it, expect } from 'vitest';
import type { BehaviorLog } from '@policyminer/protocol';
import {
  antecedentId,
  cooccurrenceId,
  countOccurrences,
  createFrequencyTables,
  mergeFrequencyTables,
} from './counting.js';
import { failedThreshold, scoreCandidates } from './scoring.js';

function createLog(logId: string, action: string, context: BehaviorLog['context']): BehaviorLog {
  return {
    logId,
    agentId: 'agent-1',
    timestamp: '2024-06-01T00:00:00Z',
    action,
    context,
    outcome: 'success',
  };
}

const logs = [
  createLog('1', 'read', { role: 'admin', region: 'eu' }),
  createLog('2', 'write', { role: 'editor' }),
  createLog('3', 'read', { role: 'admin' }),
  createLog('4', 'read', {}),
];

describe('countOccurrences', () => {
  it('counts actions, antecedents and triples', () => {
    const tables = countOccurrences(logs);

    expect(tables.total).toBe(4);
    expect([...tables.actions]).toEqual([
      ['read', 3],
      ['write', 1],
    ]);
    expect([...tables.antecedents.values()]).toEqual([
      { key: 'role', value: 'admin', count: 2 },
      { key: 'region', value: 'eu', count: 1 },
      { key: 'role', value: 'editor', count: 1 },
    ]);
    expect([...tables.cooccurrences.values()]).toEqual([
      { key: 'role', value: 'admin', action: 'read', count: 2 },
      { key: 'region', value: 'eu', action: 'read', count: 1 },
      { key: 'role', value: 'editor', action: 'write', count: 1 },
    ]);
  });

  it('keeps keys apart whatever characters they contain', () => {
    expect(antecedentId('a|b', 'c')).not.toBe(antecedentId('a', 'b|c'));
    expect(cooccurrenceId('a', 'b', 'c')).toBe('["a","b","c"]');
  });
});

describe('mergeFrequencyTables', () => {
  it('adds counts and matches a single pass over all logs', () => {
    const merged = mergeFrequencyTables(countOccurrences(logs.slice(0, 2)), countOccurrences(logs.slice(2)));
    const whole = countOccurrences(logs);

    expect(merged.total).toBe(whole.total);
    expect([...merged.actions]).toEqual([...whole.actions]);
    expect([...merged.antecedents.values()]).toEqual([...whole.antecedents.values()]);
    expect([...merged.cooccurrences.values()]).toEqual([...whole.cooccurrences.values()]);
  });

  it('appends entries first seen in the second table', () => {
    const merged = mergeFrequencyTables(
      countOccurrences([createLog('1', 'write', { role: 'editor' })]),
      countOccurrences([createLog('2', 'read', { role: 'admin' })])
    );

    expect([...merged.cooccurrences.keys()]).toEqual([
      cooccurrenceId('role', 'editor', 'write'),
      cooccurrenceId('role', 'admin', 'read'),
    ]);
  });

  it('does not modify its inputs', () => {
    const first = countOccurrences(logs);
    mergeFrequencyTables(first, countOccurrences(logs));

    expect(first.total).toBe(4);
    expect(first.cooccurrences.get(cooccurrenceId('role', 'admin', 'read'))?.count).toBe(2);
  });
});

describe('scoreCandidates', () => {
  it('computes support, confidence and lift', () => {
    const [adminRead] = scoreCandidates(countOccurrences(logs));

    expect(adminRead).toEqual({
      key: 'role',
      value: 'admin',
      action: 'read',
      cooccurrenceCount: 2,
      antecedentCount: 2,
      actionCount: 3,
      support: 0.5,
      confidence: 1,
      lift: 4 / 3,
    });
  });

  it('returns nothing for empty tables', () => {
    expect(scoreCandidates(createFrequencyTables())).toEqual([]);
  });

  it('scores a lift of zero when the action baseline is missing', () => {
    const tables = createFrequencyTables();
    tables.total = 2;
    tables.antecedents.set(antecedentId('k', 'v'), { key: 'k', value: 'v', count: 1 });
    tables.cooccurrences.set(cooccurrenceId('k', 'v', 'ghost'), {
      key: 'k',
      value: 'v',
      action: 'ghost',
      count: 1,
    });

    expect(() => scoreCandidates(tables)).not.toThrow();
    expect(scoreCandidates(tables)[0].lift).toBe(0);
  });
});

describe('failedThreshold', () => {
  const candidate = {
    key: 'k',
    value: 'v',
    action: 'a',
    cooccurrenceCount: 1,
    antecedentCount: 1,
    actionCount: 1,
    support: 0.1,
    confidence: 0.5,
    lift: 0.8,
  };

  it('checks support before confidence before lift', () => {
    expect(failedThreshold(candidate, { minSupport: 0.2, minConfidence: 0.9, minLift: 1 })).toBe('minSupport');
    expect(failedThreshold(candidate, { minSupport: 0.1, minConfidence: 0.9, minLift: 1 })).toBe('minConfidence');
    expect(failedThreshold(candidate, { minSupport: 0.1, minConfidence: 0.5, minLift: 1 })).toBe('minLift');
    expect(failedThreshold(candidate, { minSupport: 0.1, minConfidence: 0.5, minLift: 0.8 })).toBeNull();
  });
});
