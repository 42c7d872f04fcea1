// Behavior log construction

import {
  validateBehaviorLogRecord,
  type BehaviorLog,
  type ValidateBehaviorLogOptions,
} from '@policyminer/protocol';
import { InvalidBehaviorLogError } from '../errors.js';

/**
 * Validate and normalize one wire record.
 *
 * @throws InvalidBehaviorLogError naming the first offending field
 */
export function createBehaviorLog(
  input: unknown,
  options: ValidateBehaviorLogOptions = {}
): BehaviorLog {
  const result = validateBehaviorLogRecord(input, options);
  if (!result.valid) {
    const [first] = result.errors;
    throw new InvalidBehaviorLogError(first.path === '' ? 'record' : first.path, first.message);
  }
  return result.value;
}
