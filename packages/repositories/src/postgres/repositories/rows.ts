// Row <-> domain mapping for the Postgres repositories

import type { BehaviorLog, MinedPolicy, StoredPolicySet } from '@policyminer/protocol';
import type { behaviorLogs, minedPolicies, policySets } from '../schema/index.js';

export type BehaviorLogRow = typeof behaviorLogs.$inferSelect;
export type BehaviorLogInsert = typeof behaviorLogs.$inferInsert;
export type PolicySetRow = typeof policySets.$inferSelect;
export type PolicySetInsert = typeof policySets.$inferInsert;
export type MinedPolicyRow = typeof minedPolicies.$inferSelect;
export type MinedPolicyInsert = typeof minedPolicies.$inferInsert;

/**
 * Rows per INSERT statement. postgres.js caps a statement at 65534
 * parameters; the widest row here binds 10.
 */
export const INSERT_CHUNK_SIZE = 1000;

/**
 * Split rows into consecutive chunks of at most `size`, keeping order.
 */
export function chunkRows<T>(rows: readonly T[], size: number = INSERT_CHUNK_SIZE): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let start = 0; start < rows.length; start += size) {
    chunks.push(rows.slice(start, start + size));
  }
  return chunks;
}

export function toBehaviorLogInsert(log: BehaviorLog): BehaviorLogInsert {
  return {
    logId: log.logId,
    agentId: log.agentId,
    timestamp: log.timestamp,
    occurredAt: new Date(log.timestamp),
    action: log.action,
    context: { ...log.context },
    outcome: log.outcome,
  };
}

export function rowToBehaviorLog(row: BehaviorLogRow): BehaviorLog {
  return {
    logId: row.logId,
    agentId: row.agentId,
    timestamp: row.timestamp,
    action: row.action,
    context: row.context,
    outcome: row.outcome,
  };
}

export function toMinedPolicyInserts(
  policySetId: string,
  policies: readonly MinedPolicy[]
): MinedPolicyInsert[] {
  return policies.map((policy, position) => ({
    policySetId,
    position,
    policyId: policy.policyId,
    antecedentKey: policy.antecedent.key,
    antecedentValue: policy.antecedent.value,
    consequent: policy.consequent,
    support: policy.support,
    confidence: policy.confidence,
    lift: policy.lift,
    description: policy.description,
  }));
}

export function rowToMinedPolicy(row: MinedPolicyRow): MinedPolicy {
  return {
    policyId: row.policyId,
    antecedent: { key: row.antecedentKey, value: row.antecedentValue },
    consequent: row.consequent,
    support: row.support,
    confidence: row.confidence,
    lift: row.lift,
    description: row.description,
  };
}

/**
 * Assemble a stored set from its row and its policy rows.
 * Policy rows may arrive in any order; position decides.
 */
export function rowsToStoredPolicySet(
  row: PolicySetRow,
  policyRows: readonly MinedPolicyRow[]
): StoredPolicySet {
  const ordered = [...policyRows].sort((a, b) => a.position - b.position);

  return {
    id: row.id,
    policySet: {
      name: row.name,
      sourceLogs: row.sourceLogs,
      policies: ordered.map(rowToMinedPolicy),
      generatedAt: row.generatedAt,
    },
    thresholds: {
      minSupport: row.minSupport,
      minConfidence: row.minConfidence,
      minLift: row.minLift,
    },
    storedAt: row.storedAt.toISOString(),
  };
}
