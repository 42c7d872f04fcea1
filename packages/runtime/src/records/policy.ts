// Mined policy and policy set construction
//
// The extractor builds its output through these, so every emitted value
// satisfies the same invariants as a decoded document.

import {
  DEFAULT_POLICY_SET_NAME,
  type Antecedent,
  type MinedPolicy,
  type PolicySet,
} from '@policyminer/protocol';
import { InvalidPolicyError, ValidationError } from '../errors.js';

export type CreateMinedPolicyInput = {
  policyId: string;
  antecedent: Antecedent;
  consequent: string;
  support: number;
  confidence: number;
  lift: number;
  description: string;
};

function requireNonBlank(field: string, value: string): void {
  if (value.trim() === '') {
    throw new InvalidPolicyError(field, `${field} must not be blank`);
  }
}

function requireFraction(field: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidPolicyError(field, `${field} must be between 0 and 1`);
  }
}

/**
 * @throws InvalidPolicyError naming the offending field
 */
export function createMinedPolicy(input: CreateMinedPolicyInput): MinedPolicy {
  requireNonBlank('policyId', input.policyId);
  requireNonBlank('consequent', input.consequent);
  requireFraction('support', input.support);
  requireFraction('confidence', input.confidence);
  if (!Number.isFinite(input.lift) || input.lift < 0) {
    throw new InvalidPolicyError('lift', 'lift must be a finite number >= 0');
  }

  return {
    policyId: input.policyId,
    antecedent: { key: input.antecedent.key, value: input.antecedent.value },
    consequent: input.consequent,
    support: input.support,
    confidence: input.confidence,
    lift: input.lift,
    description: input.description,
  };
}

export type CreatePolicySetInput = {
  name?: string;
  sourceLogs: number;
  policies?: readonly MinedPolicy[];
  generatedAt?: string;
};

/**
 * Build a policy set; `generatedAt` defaults to the current time.
 *
 * @throws ValidationError when sourceLogs is not a non-negative integer
 */
export function createPolicySet(
  input: CreatePolicySetInput,
  options: { now?: () => Date } = {}
): PolicySet {
  if (!Number.isInteger(input.sourceLogs) || input.sourceLogs < 0) {
    throw new ValidationError('sourceLogs must be a non-negative integer', {
      field: 'sourceLogs',
      details: { sourceLogs: input.sourceLogs },
    });
  }

  const now = options.now ?? (() => new Date());

  return {
    name: input.name ?? DEFAULT_POLICY_SET_NAME,
    sourceLogs: input.sourceLogs,
    policies: [...(input.policies ?? [])],
    generatedAt: input.generatedAt ?? now().toISOString(),
  };
}
