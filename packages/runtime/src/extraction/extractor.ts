// Policy extraction
//
// Mines single-attribute association rules "context[key] = value → action"
// from a batch of behavior logs, scores them by support, confidence and lift,
// keeps the ones that clear every threshold and ranks them by confidence.
// Extraction is synchronous and keeps no state between calls.

import {
  DEFAULT_POLICY_SET_NAME,
  DEFAULT_THRESHOLDS,
  type BehaviorLog,
  type ExtractionThresholds,
  type MinedPolicy,
  type PolicySet,
} from '@policyminer/protocol';
import { silentLogger, type MinerLogger } from '../logging/index.js';
import { roundTo } from '../numbers/format.js';
import { createMinedPolicy, createPolicySet } from '../records/policy.js';
import { coerceContextValue, type ContextValueCoercion } from './coercion.js';
import { countOccurrences } from './counting.js';
import { describeRule } from './description.js';
import { failedThreshold, scoreCandidates } from './scoring.js';

const METRIC_DIGITS = 6;

export type PolicyExtractorOptions = Partial<ExtractionThresholds> & {
  logger?: MinerLogger;

  /**
   * Turns context values into antecedent text (defaults to coerceContextValue)
   */
  coerceValue?: ContextValueCoercion;
};

export type ExtractOptions = {
  name?: string;

  /**
   * Timestamp stamped on the result (defaults to now)
   */
  generatedAt?: string;
};

export function formatPolicyId(index: number): string {
  return `policy_${String(index + 1).padStart(4, '0')}`;
}

/**
 * Stable sort by confidence, highest first. Ties keep their input order.
 */
export function sortByConfidence<T extends Pick<MinedPolicy, 'confidence'>>(policies: readonly T[]): T[] {
  return [...policies].sort((a, b) => b.confidence - a.confidence);
}

export class PolicyExtractor {
  readonly thresholds: Readonly<ExtractionThresholds>;
  private readonly logger: MinerLogger;
  private readonly coerceValue: ContextValueCoercion;

  constructor(options: PolicyExtractorOptions = {}) {
    this.thresholds = {
      minSupport: options.minSupport ?? DEFAULT_THRESHOLDS.minSupport,
      minConfidence: options.minConfidence ?? DEFAULT_THRESHOLDS.minConfidence,
      minLift: options.minLift ?? DEFAULT_THRESHOLDS.minLift,
    };
    this.logger = options.logger ?? silentLogger;
    this.coerceValue = options.coerceValue ?? coerceContextValue;
  }

  extract(logs: readonly BehaviorLog[], options: ExtractOptions = {}): PolicySet {
    const name = options.name ?? DEFAULT_POLICY_SET_NAME;

    if (logs.length === 0) {
      this.logger.debug('No behavior logs to mine', { name });
      return createPolicySet({ name, sourceLogs: 0, generatedAt: options.generatedAt });
    }

    const tables = countOccurrences(logs, this.coerceValue);
    const candidates = scoreCandidates(tables);
    const rejected = { minSupport: 0, minConfidence: 0, minLift: 0 };

    const survivors: Omit<MinedPolicy, 'policyId'>[] = [];
    for (const candidate of candidates) {
      const failed = failedThreshold(candidate, this.thresholds);
      if (failed) {
        rejected[failed] += 1;
        continue;
      }

      survivors.push({
        antecedent: { key: candidate.key, value: candidate.value },
        consequent: candidate.action,
        support: roundTo(candidate.support, METRIC_DIGITS),
        confidence: roundTo(candidate.confidence, METRIC_DIGITS),
        lift: roundTo(candidate.lift, METRIC_DIGITS),
        description: describeRule(candidate),
      });
    }

    const policies = sortByConfidence(survivors).map((policy, index) =>
      createMinedPolicy({ ...policy, policyId: formatPolicyId(index) })
    );

    this.logger.debug('Extracted policies', {
      name,
      sourceLogs: tables.total,
      candidates: candidates.length,
      policies: policies.length,
      rejected,
    });

    return createPolicySet({
      name,
      sourceLogs: tables.total,
      policies,
      generatedAt: options.generatedAt,
    });
  }
}

/**
 * One-shot extraction with a fresh extractor.
 */
export function extractPolicies(
  logs: readonly BehaviorLog[],
  options: PolicyExtractorOptions & ExtractOptions = {}
): PolicySet {
  const { name, generatedAt, ...extractorOptions } = options;
  return new PolicyExtractor(extractorOptions).extract(logs, { name, generatedAt });
}
