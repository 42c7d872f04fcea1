// Determinism Checking
//
// Re-runs an extraction over the same logs and verifies every run encodes to
// the same document. A mined policy set is only auditable if the same input
// always yields the same ids, order and numbers.

import { encodePolicySet, type BehaviorLog, type PolicySet } from '@policyminer/protocol';
import { PolicyExtractor, type PolicyExtractorOptions } from '../extraction/index.js';

/**
 * Options for determinism checking
 */
export type DeterminismCheckOptions = PolicyExtractorOptions & {
  /**
   * Number of times to run the extraction (default: 3)
   */
  iterations?: number;

  /**
   * Fixed timestamp stamped on every run
   */
  generatedAt?: string;

  name?: string;
};

/**
 * Result of a determinism check
 */
export type DeterminismCheckResult = {
  isDeterministic: boolean;

  iterations: number;

  /**
   * Policy sets from each iteration (should all be identical if deterministic)
   */
  policySetsByIteration: PolicySet[];

  /**
   * Differences found between iterations (empty if deterministic)
   */
  differences: string[];

  durationMs: number;
};

/**
 * Compare two policy sets by their encoded documents.
 *
 * @returns Differences found (empty if equal)
 */
export function comparePolicySets(first: PolicySet, second: PolicySet): string[] {
  const a = encodePolicySet(first);
  const b = encodePolicySet(second);
  const differences: string[] = [];

  if (a.name !== b.name) {
    differences.push(`Different names: ${a.name} vs ${b.name}`);
  }
  if (a.source_logs !== b.source_logs) {
    differences.push(`Different source log counts: ${a.source_logs} vs ${b.source_logs}`);
  }
  if (a.generated_at !== b.generated_at) {
    differences.push(`Different timestamps: ${a.generated_at} vs ${b.generated_at}`);
  }
  if (a.policies.length !== b.policies.length) {
    differences.push(`Different number of policies: ${a.policies.length} vs ${b.policies.length}`);
    return differences;
  }

  for (let i = 0; i < a.policies.length; i++) {
    const str1 = JSON.stringify(a.policies[i]);
    const str2 = JSON.stringify(b.policies[i]);

    if (str1 !== str2) {
      differences.push(`Policy ${i} differs: ${str1} vs ${str2}`);
    }
  }

  return differences;
}

/**
 * Check that extraction produces identical results on repeated runs.
 *
 * @example
 * ```typescript
 * const result = checkExtractionDeterminism(logs, { iterations: 5, minConfidence: 0.8 });
 * if (!result.isDeterministic) {
 *   logger.error('Extraction is non-deterministic', { differences: result.differences });
 * }
 * ```
 */
export function checkExtractionDeterminism(
  logs: readonly BehaviorLog[],
  options: DeterminismCheckOptions = {}
): DeterminismCheckResult {
  const startTime = Date.now();
  const {
    iterations = 3,
    generatedAt = new Date().toISOString(),
    name,
    ...extractorOptions
  } = options;

  const policySetsByIteration: PolicySet[] = [];
  for (let i = 0; i < iterations; i++) {
    // A fresh extractor per run, so nothing carries over between iterations
    const extractor = new PolicyExtractor(extractorOptions);
    policySetsByIteration.push(extractor.extract(logs, { name, generatedAt }));
  }

  const differences: string[] = [];
  const [reference] = policySetsByIteration;

  for (let i = 1; i < policySetsByIteration.length; i++) {
    const iterDiffs = comparePolicySets(reference, policySetsByIteration[i]);
    if (iterDiffs.length > 0) {
      differences.push(`Iteration ${i + 1} differs from iteration 1:`);
      for (const diff of iterDiffs) {
        differences.push(`  ${diff}`);
      }
    }
  }

  return {
    isDeterministic: differences.length === 0,
    iterations,
    policySetsByIteration,
    differences,
    durationMs: Date.now() - startTime,
  };
}
