// Tests for the in-memory repositories

import { describe, it, expect, beforeEach } from 'vitest';
import type { BehaviorLog, PolicySet } from '@policyminer/protocol';
import { DEFAULT_THRESHOLDS } from '@policyminer/protocol';
import { createInMemoryRepositoryContext, type InMemoryRepositoryContext } from './index.js';

function createLog(logId: string, agentId: string, action: string, timestamp: string): BehaviorLog {
  return {
    logId,
    agentId,
    action,
    timestamp,
    context: { role: 'admin' },
    outcome: 'success',
  };
}

function createPolicySet(name: string): PolicySet {
  return {
    name,
    sourceLogs: 1,
    generatedAt: '2024-02-01T00:00:00.000Z',
    policies: [
      {
        policyId: 'policy_0001',
        antecedent: { key: 'role', value: 'admin' },
        consequent: 'read',
        support: 1,
        confidence: 1,
        lift: 1,
        description: 'd',
      },
    ],
  };
}

describe('in-memory behavior log repository', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(async () => {
    repos = createInMemoryRepositoryContext();
    await repos.behaviorLogs.appendMany([
      createLog('log-1', 'agent-a', 'read', '2024-01-01T00:00:00Z'),
      createLog('log-2', 'agent-b', 'write', '2024-01-02T00:00:00Z'),
      createLog('log-3', 'agent-a', 'write', '2024-01-03T00:00:00Z'),
      createLog('log-3', 'agent-a', 'write', '2024-01-04T00:00:00Z'),
    ]);
  });

  it('lists logs in insertion order and keeps duplicates', async () => {
    const logs = await repos.behaviorLogs.list();
    expect(logs.map((l) => l.logId)).toEqual(['log-1', 'log-2', 'log-3', 'log-3']);
  });

  it('filters by agent and action', async () => {
    const logs = await repos.behaviorLogs.list({ agentId: 'agent-a', action: 'write' });
    expect(logs.map((l) => l.timestamp)).toEqual([
      '2024-01-03T00:00:00Z',
      '2024-01-04T00:00:00Z',
    ]);
  });

  it('filters by inclusive time bounds', async () => {
    const logs = await repos.behaviorLogs.list({
      since: '2024-01-02T00:00:00Z',
      until: '2024-01-03T00:00:00Z',
    });
    expect(logs.map((l) => l.logId)).toEqual(['log-2', 'log-3']);
  });

  it('applies offset and limit', async () => {
    const logs = await repos.behaviorLogs.list({ offset: 1, limit: 2 });
    expect(logs.map((l) => l.logId)).toEqual(['log-2', 'log-3']);
  });

  it('counts with a filter and ignores pagination', async () => {
    expect(await repos.behaviorLogs.count()).toBe(4);
    expect(await repos.behaviorLogs.count({ action: 'write', limit: 1 })).toBe(3);
  });

  it('appends a single log', async () => {
    const log = createLog('log-5', 'agent-c', 'delete', '2024-01-05T00:00:00Z');
    await expect(repos.behaviorLogs.append(log)).resolves.toBe(log);
    expect(await repos.behaviorLogs.count()).toBe(5);
  });

  it('appends more logs than fit in one call frame', async () => {
    const log = createLog('log-bulk', 'agent-d', 'read', '2024-01-06T00:00:00Z');
    const bulk = Array.from({ length: 250_000 }, () => log);

    await expect(repos.behaviorLogs.appendMany(bulk)).resolves.toBe(250_000);
    expect(await repos.behaviorLogs.count()).toBe(250_004);
  });
});

describe('in-memory policy set repository', () => {
  let repos: InMemoryRepositoryContext;

  beforeEach(() => {
    repos = createInMemoryRepositoryContext();
  });

  it('saves with a generated id and returns it by id', async () => {
    const stored = await repos.policySets.save({
      policySet: createPolicySet('first'),
      thresholds: { ...DEFAULT_THRESHOLDS },
    });

    expect(stored.id).toBe('policy-set-1');
    expect(stored.thresholds).toEqual({ minSupport: 0.05, minConfidence: 0.6, minLift: 1 });
    expect(await repos.policySets.get('policy-set-1')).toEqual(stored);
  });

  it('keeps a caller-supplied id', async () => {
    const stored = await repos.policySets.save({
      id: 'weekly',
      policySet: createPolicySet('weekly'),
      thresholds: { ...DEFAULT_THRESHOLDS },
    });
    expect(stored.id).toBe('weekly');
  });

  it('returns null for an unknown id', async () => {
    expect(await repos.policySets.get('missing')).toBeNull();
  });

  it('lists newest first and filters by name', async () => {
    for (const name of ['a', 'b', 'a']) {
      await repos.policySets.save({
        policySet: createPolicySet(name),
        thresholds: { ...DEFAULT_THRESHOLDS },
      });
    }

    const all = await repos.policySets.list();
    expect(all.map((s) => s.id)).toEqual(['policy-set-3', 'policy-set-2', 'policy-set-1']);

    const named = await repos.policySets.list({ name: 'a', limit: 1 });
    expect(named.map((s) => s.id)).toEqual(['policy-set-3']);
  });

  it('deletes a stored set', async () => {
    const stored = await repos.policySets.save({
      policySet: createPolicySet('gone'),
      thresholds: { ...DEFAULT_THRESHOLDS },
    });

    expect(await repos.policySets.delete(stored.id)).toBe(true);
    expect(await repos.policySets.delete(stored.id)).toBe(false);
    expect(await repos.policySets.get(stored.id)).toBeNull();
  });

  it('clears all data', async () => {
    await repos.policySets.save({
      policySet: createPolicySet('x'),
      thresholds: { ...DEFAULT_THRESHOLDS },
    });
    repos.clear();

    expect(repos._data.policySets.size).toBe(0);
    expect(repos._data.behaviorLogs).toHaveLength(0);
  });

  it('runs transactions against the same stores', async () => {
    const id = await repos.transaction(async (tx) => {
      const stored = await tx.policySets.save({
        policySet: createPolicySet('tx'),
        thresholds: { ...DEFAULT_THRESHOLDS },
      });
      return stored.id;
    });

    expect(await repos.policySets.get(id)).not.toBeNull();
  });
});
