// Rule scoring and threshold filtering

import type { ExtractionThresholds } from '@policyminer/protocol';
import { antecedentId, type FrequencyTables } from './counting.js';

/**
 * A (key, value) → action rule with its raw counts and un-rounded metrics.
 */
export type RuleCandidate = {
  key: string;
  value: string;
  action: string;
  cooccurrenceCount: number;
  antecedentCount: number;
  actionCount: number;
  support: number;
  confidence: number;
  lift: number;
};

/**
 * Score every co-occurrence triple, in enumeration order.
 */
export function scoreCandidates(tables: FrequencyTables): RuleCandidate[] {
  const { total } = tables;
  if (total === 0) {
    return [];
  }

  const candidates: RuleCandidate[] = [];

  for (const entry of tables.cooccurrences.values()) {
    const antecedentCount = tables.antecedents.get(antecedentId(entry.key, entry.value))?.count ?? 0;
    const actionCount = tables.actions.get(entry.action) ?? 0;

    const support = entry.count / total;
    const confidence = antecedentCount > 0 ? entry.count / antecedentCount : 0;
    // A triple always implies its action was counted, so the baseline is
    // positive for tables built by countOccurrences.
    const baseline = actionCount / total;
    const lift = baseline > 0 ? confidence / baseline : 0;

    candidates.push({
      key: entry.key,
      value: entry.value,
      action: entry.action,
      cooccurrenceCount: entry.count,
      antecedentCount,
      actionCount,
      support,
      confidence,
      lift,
    });
  }

  return candidates;
}

/**
 * Check a candidate against the thresholds: support, then confidence, then lift.
 * Returns the name of the first failed threshold, or null when it passes.
 */
export function failedThreshold(
  candidate: RuleCandidate,
  thresholds: ExtractionThresholds
): keyof ExtractionThresholds | null {
  if (candidate.support < thresholds.minSupport) return 'minSupport';
  if (candidate.confidence < thresholds.minConfidence) return 'minConfidence';
  if (candidate.lift < thresholds.minLift) return 'minLift';
  return null;
}
