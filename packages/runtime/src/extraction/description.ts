import { formatFixed } from '../numbers/format.js';
import { quoteText } from './coercion.js';
import type { RuleCandidate } from './scoring.js';

/**
 * Sentence describing a rule, built from its un-rounded metrics.
 */
export function describeRule(
  rule: Pick<RuleCandidate, 'key' | 'value' | 'action' | 'support' | 'confidence' | 'lift'>
): string {
  const confidence = formatFixed(rule.confidence * 100, 1);
  const support = formatFixed(rule.support * 100, 1);
  const lift = formatFixed(rule.lift, 2);

  return (
    `When ${rule.key}=${quoteText(rule.value)}, agents perform '${rule.action}' ` +
    `with ${confidence}% confidence (support=${support}%, lift=${lift})`
  );
}
