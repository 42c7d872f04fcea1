import type { BehaviorLog, Id, Timestamp } from '@policyminer/protocol';

/**
 * Filter for reading behavior logs.
 * Time bounds are inclusive and compare the logs' own timestamps.
 */
export type BehaviorLogFilter = {
  agentId?: Id;
  action?: string;
  since?: Timestamp;
  until?: Timestamp;
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for the behavior log.
 *
 * The log is append-only. Reads return records in insertion order, which is
 * the enumeration order extraction relies on for deterministic output.
 * Duplicate logIds are stored as separate records.
 */
export interface BehaviorLogRepository {
  /**
   * Append one validated log
   */
  append(log: BehaviorLog): Promise<BehaviorLog>;

  /**
   * Append many logs in order
   * @returns Number of logs appended
   */
  appendMany(logs: readonly BehaviorLog[]): Promise<number>;

  /**
   * List logs in insertion order
   */
  list(filter?: BehaviorLogFilter): Promise<BehaviorLog[]>;

  /**
   * Count logs matching a filter (limit and offset are ignored)
   */
  count(filter?: BehaviorLogFilter): Promise<number>;
}
