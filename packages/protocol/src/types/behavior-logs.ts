// Behavior log types - the input records of policy mining

import type { Id, JsonValue, Timestamp } from './common.js';

/**
 * Situational attributes recorded alongside an action.
 * Keys are attribute names; values are stored exactly as received.
 */
export type BehaviorContext = Record<string, JsonValue>;

/**
 * The outcome label used when a record does not carry one.
 */
export const DEFAULT_OUTCOME = 'success';

/**
 * A single recorded agent action in context.
 * Immutable once constructed; extraction only reads it.
 */
export type BehaviorLog = {
  /**
   * Identifier of the log entry. Not required to be unique within a batch.
   */
  readonly logId: Id;

  /**
   * The agent that performed the action
   */
  readonly agentId: Id;

  /**
   * When the action happened (informational, extraction ignores it)
   */
  readonly timestamp: Timestamp;

  /**
   * The action taken, e.g. "read_file" or "send_email"
   */
  readonly action: string;

  /**
   * Key/value metadata describing the situation
   */
  readonly context: Readonly<BehaviorContext>;

  /**
   * Outcome label, e.g. "success", "denied", "error"
   */
  readonly outcome: string;
};

/**
 * Wire form of a behavior log, one per NDJSON line.
 */
export type BehaviorLogRecord = {
  log_id: string;
  agent_id: string;
  timestamp?: string;
  action: string;
  context?: BehaviorContext;
  outcome?: string;
};
