// Tests for the mining workflow

import { describe, it, expect, beforeEach } from 'vitest';
import type { BehaviorLog } from '@policyminer/protocol';
import { memory } from '@policyminer/repositories';
import { minePolicies } from './run.js';
import { createCapturingLogger } from '../logging/index.js';

function createLog(logId: string, agentId: string, action: string, role: string): BehaviorLog {
  return {
    logId,
    agentId,
    timestamp: `2024-02-0${logId}T00:00:00Z`,
    action,
    context: { role },
    outcome: 'success',
  };
}

describe('minePolicies', () => {
  let repos: memory.InMemoryRepositoryContext;

  beforeEach(async () => {
    repos = memory.createInMemoryRepositoryContext();
    await repos.behaviorLogs.appendMany([
      createLog('1', 'agent-a', 'read', 'admin'),
      createLog('2', 'agent-a', 'read', 'admin'),
      createLog('3', 'agent-b', 'write', 'editor'),
      createLog('4', 'agent-b', 'read', 'editor'),
    ]);
  });

  it('mines stored logs and saves the result with its thresholds', async () => {
    const stored = await minePolicies(repos, {
      name: 'All agents',
      minConfidence: 0.5,
      generatedAt: '2024-02-10T00:00:00.000Z',
    });

    expect(stored.policySet.name).toBe('All agents');
    expect(stored.policySet.sourceLogs).toBe(4);
    expect(stored.policySet.generatedAt).toBe('2024-02-10T00:00:00.000Z');
    expect(stored.thresholds).toEqual({ minSupport: 0.05, minConfidence: 0.5, minLift: 1 });
    expect(
      stored.policySet.policies.map((p) => [p.antecedent.value, p.consequent, p.confidence])
    ).toEqual([
      ['admin', 'read', 1],
      ['editor', 'write', 0.5],
    ]);
    expect(await repos.policySets.get(stored.id)).toEqual(stored);
  });

  it('mines only the logs matching the filter', async () => {
    const stored = await minePolicies(repos, { filter: { agentId: 'agent-b' }, minConfidence: 0 });

    expect(stored.policySet.sourceLogs).toBe(2);
    expect(stored.policySet.policies.map((p) => p.consequent)).toEqual(['write', 'read']);
  });

  it('applies the time window', async () => {
    const stored = await minePolicies(repos, {
      filter: { since: '2024-02-02T00:00:00Z', until: '2024-02-03T00:00:00Z' },
    });

    expect(stored.policySet.sourceLogs).toBe(2);
  });

  it('logs a summary', async () => {
    const logger = createCapturingLogger();

    const stored = await minePolicies(repos, { logger });

    const summary = logger.entries.find((e) => e.message === 'Mined policy set');
    expect(summary?.level).toBe('info');
    expect(summary?.data).toMatchObject({ id: stored.id, sourceLogs: 4 });
  });
});
