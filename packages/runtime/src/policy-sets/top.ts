import type { MinedPolicy, PolicySet } from '@policyminer/protocol';
import { sortByConfidence } from '../extraction/extractor.js';

export const DEFAULT_TOP_COUNT = 10;

/**
 * The `n` highest-confidence policies of a set, as a new array.
 * Ties keep stored order; `n <= 0` yields nothing and fractional `n` is floored.
 */
export function topPolicies(policySet: PolicySet, n: number = DEFAULT_TOP_COUNT): MinedPolicy[] {
  const count = Math.floor(n);
  if (!(count > 0)) {
    return [];
  }
  return sortByConfidence(policySet.policies).slice(0, count);
}
