// Mined policy and policy set types

import type { Id, Timestamp } from './common.js';

/**
 * The single context condition that triggers a rule.
 * The value is the string-coerced form of the context value.
 */
export type Antecedent = {
  readonly key: string;
  readonly value: string;
};

/**
 * A governance policy extracted from behavioral patterns:
 * "when antecedent holds, agents perform consequent".
 */
export type MinedPolicy = {
  /**
   * policy_NNNN, assigned in output order
   */
  readonly policyId: Id;

  readonly antecedent: Antecedent;

  /**
   * The action the rule predicts
   */
  readonly consequent: string;

  /**
   * Fraction of all logs showing both antecedent and consequent (0-1)
   */
  readonly support: number;

  /**
   * Fraction of antecedent-matching logs that show the consequent (0-1)
   */
  readonly confidence: number;

  /**
   * Confidence relative to the consequent's baseline frequency (>= 0)
   */
  readonly lift: number;

  /**
   * Human-readable sentence summarizing the rule
   */
  readonly description: string;
};

/**
 * The ranked output of one extraction run.
 */
export type PolicySet = {
  readonly name: string;

  /**
   * Number of behavior logs analysed
   */
  readonly sourceLogs: number;

  /**
   * Policies in output order (confidence descending)
   */
  readonly policies: readonly MinedPolicy[];

  readonly generatedAt: Timestamp;
};

/**
 * Thresholds a rule must clear to be emitted.
 */
export type ExtractionThresholds = {
  minSupport: number;
  minConfidence: number;
  minLift: number;
};

export const DEFAULT_THRESHOLDS: Readonly<ExtractionThresholds> = {
  minSupport: 0.05,
  minConfidence: 0.6,
  minLift: 1.0,
};

export const DEFAULT_POLICY_SET_NAME = 'Mined Policy Set';

/**
 * A policy set persisted by a repository, with the run's configuration.
 */
export type StoredPolicySet = {
  id: Id;
  policySet: PolicySet;
  thresholds: ExtractionThresholds;
  storedAt: Timestamp;
};
