// Behavior log validation and normalization

import type { BehaviorLog, BehaviorLogRecord } from '../types/behavior-logs.js';
import { DEFAULT_OUTCOME } from '../types/behavior-logs.js';
import { BehaviorLogRecordSchema } from './schemas.js';
import { toValidationIssues, type ValidationResult } from './results.js';

/**
 * Options for validating a behavior log record
 */
export type ValidateBehaviorLogOptions = {
  /** Clock used for the default timestamp (defaults to the system clock) */
  now?: () => Date;
};

/**
 * Validate a wire record and normalize it into a BehaviorLog.
 *
 * Identifiers and the action are trimmed, the timestamp defaults to the
 * current time, the outcome to "success" and the context to an empty mapping.
 * Context values are kept exactly as received.
 */
export function validateBehaviorLogRecord(
  value: unknown,
  options: ValidateBehaviorLogOptions = {}
): ValidationResult<BehaviorLog> {
  const parsed = BehaviorLogRecordSchema.safeParse(value);
  if (!parsed.success) {
    return { valid: false, errors: toValidationIssues(parsed.error) };
  }

  const record = parsed.data;
  const now = options.now ?? (() => new Date());

  return {
    valid: true,
    value: {
      logId: record.log_id,
      agentId: record.agent_id,
      timestamp: record.timestamp ?? now().toISOString(),
      action: record.action,
      context: record.context ?? {},
      outcome: record.outcome ?? DEFAULT_OUTCOME,
    },
  };
}

/**
 * Convert a BehaviorLog back into its wire form.
 */
export function encodeBehaviorLog(log: BehaviorLog): BehaviorLogRecord {
  return {
    log_id: log.logId,
    agent_id: log.agentId,
    timestamp: log.timestamp,
    action: log.action,
    context: { ...log.context },
    outcome: log.outcome,
  };
}
