// In-memory repository implementations for development and testing
//
// Useful for:
// - Local development without a database
// - Fast unit testing
//
// Data does not persist between restarts.

import type { BehaviorLog, StoredPolicySet } from '@policyminer/protocol';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  BehaviorLogRepository,
  BehaviorLogFilter,
  PolicySetRepository,
} from '../interfaces/index.js';

/**
 * In-memory data store that can be accessed for debugging/inspection.
 */
export interface InMemoryDataStore {
  behaviorLogs: BehaviorLog[];
  policySets: Map<string, StoredPolicySet>;
}

/**
 * Extended repository context with access to underlying data and clear function.
 */
export interface InMemoryRepositoryContext extends TransactionalRepositoryContext {
  /** Direct access to underlying data stores (for debugging/testing) */
  _data: InMemoryDataStore;
  /** Clear all data */
  clear(): void;
}

function matchesBehaviorLogFilter(log: BehaviorLog, filter: BehaviorLogFilter): boolean {
  if (filter.agentId !== undefined && log.agentId !== filter.agentId) return false;
  if (filter.action !== undefined && log.action !== filter.action) return false;

  if (filter.since !== undefined || filter.until !== undefined) {
    const time = Date.parse(log.timestamp);
    if (filter.since !== undefined && time < Date.parse(filter.since)) return false;
    if (filter.until !== undefined && time > Date.parse(filter.until)) return false;
  }

  return true;
}

function paginate<T>(items: T[], page: { limit?: number; offset?: number }): T[] {
  let result = items;
  if (page.offset) {
    result = result.slice(page.offset);
  }
  if (page.limit) {
    result = result.slice(0, page.limit);
  }
  return result;
}

/**
 * Create a complete in-memory repository context.
 *
 * @example
 * ```typescript
 * const repos = createInMemoryRepositoryContext();
 *
 * await repos.behaviorLogs.appendMany(logs);
 * const stored = await minePolicies(repos, { name: 'Test' });
 *
 * // Access underlying data for debugging
 * console.log(repos._data.policySets.size);
 *
 * // Clear all data
 * repos.clear();
 * ```
 */
export function createInMemoryRepositoryContext(): InMemoryRepositoryContext {
  // Data stores
  const behaviorLogs: BehaviorLog[] = [];
  const policySets = new Map<string, StoredPolicySet>();
  let policySetSequence = 0;

  // Behavior log repository
  const behaviorLogRepo: BehaviorLogRepository = {
    async append(log) {
      behaviorLogs.push(log);
      return log;
    },
    async appendMany(logs) {
      for (const log of logs) {
        behaviorLogs.push(log);
      }
      return logs.length;
    },
    async list(filter = {}) {
      const matching = behaviorLogs.filter((log) => matchesBehaviorLogFilter(log, filter));
      return paginate(matching, filter);
    },
    async count(filter = {}) {
      return behaviorLogs.filter((log) => matchesBehaviorLogFilter(log, filter)).length;
    },
  };

  // Policy set repository
  const policySetRepo: PolicySetRepository = {
    async save(input) {
      policySetSequence += 1;
      const id = input.id ?? `policy-set-${policySetSequence}`;
      const stored: StoredPolicySet = {
        id,
        policySet: {
          ...input.policySet,
          policies: [...input.policySet.policies],
        },
        thresholds: { ...input.thresholds },
        storedAt: new Date().toISOString(),
      };
      // Re-saving an id moves it to the newest position
      policySets.delete(id);
      policySets.set(id, stored);
      return stored;
    },
    async get(id) {
      return policySets.get(id) ?? null;
    },
    async list(filter = {}) {
      // Map iteration is insertion order; newest first means reversed
      let result = Array.from(policySets.values()).reverse();
      if (filter.name !== undefined) {
        result = result.filter((stored) => stored.policySet.name === filter.name);
      }
      return paginate(result, filter);
    },
    async delete(id) {
      return policySets.delete(id);
    },
  };

  // Build context
  const context: RepositoryContext = {
    behaviorLogs: behaviorLogRepo,
    policySets: policySetRepo,
  };

  return {
    ...context,
    // Transaction support (in-memory is always atomic)
    async transaction<T>(fn: (repos: RepositoryContext) => Promise<T>): Promise<T> {
      return fn(context);
    },
    _data: {
      behaviorLogs,
      policySets,
    },
    clear() {
      behaviorLogs.length = 0;
      policySets.clear();
      policySetSequence = 0;
    },
  };
}
