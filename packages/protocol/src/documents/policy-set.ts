// PolicySet document codec
//
// The JSON document is the persisted and exchanged form of a policy set:
// exactly name, source_logs, policies and generated_at at the top level, each
// policy with a single-key antecedent object. Decoding validates everything and
// preserves policy order, so encode -> validate reproduces the original value.

import type { MinedPolicy, PolicySet } from '../types/policies.js';
import {
  MinedPolicyDocumentSchema,
  PolicySetDocumentSchema,
  type MinedPolicyDocument,
  type PolicySetDocument,
} from '../validation/schemas.js';
import { toValidationIssues, type ValidationResult } from '../validation/results.js';

export function encodeMinedPolicy(policy: MinedPolicy): MinedPolicyDocument {
  return {
    policy_id: policy.policyId,
    antecedent: { [policy.antecedent.key]: policy.antecedent.value },
    consequent: policy.consequent,
    support: policy.support,
    confidence: policy.confidence,
    lift: policy.lift,
    description: policy.description,
  };
}

export function encodePolicySet(policySet: PolicySet): PolicySetDocument {
  return {
    name: policySet.name,
    source_logs: policySet.sourceLogs,
    policies: policySet.policies.map(encodeMinedPolicy),
    generated_at: policySet.generatedAt,
  };
}

// Only called on documents that passed MinedPolicyDocumentSchema,
// whose antecedent has exactly one entry.
function fromMinedPolicyDocument(document: MinedPolicyDocument): MinedPolicy {
  const [[key, value]] = Object.entries(document.antecedent);
  return {
    policyId: document.policy_id,
    antecedent: { key, value },
    consequent: document.consequent,
    support: document.support,
    confidence: document.confidence,
    lift: document.lift,
    description: document.description,
  };
}

/**
 * Validate a single policy document and convert it to a MinedPolicy.
 */
export function validateMinedPolicyDocument(value: unknown): ValidationResult<MinedPolicy> {
  const parsed = MinedPolicyDocumentSchema.safeParse(value);
  if (!parsed.success) {
    return { valid: false, errors: toValidationIssues(parsed.error) };
  }
  return { valid: true, value: fromMinedPolicyDocument(parsed.data) };
}

/**
 * Validate a policy set document and convert it to a PolicySet.
 * No partial recovery: any invalid field fails the whole document.
 */
export function validatePolicySetDocument(value: unknown): ValidationResult<PolicySet> {
  const parsed = PolicySetDocumentSchema.safeParse(value);
  if (!parsed.success) {
    return { valid: false, errors: toValidationIssues(parsed.error) };
  }

  const document = parsed.data;
  return {
    valid: true,
    value: {
      name: document.name,
      sourceLogs: document.source_logs,
      policies: document.policies.map(fromMinedPolicyDocument),
      generatedAt: document.generated_at,
    },
  };
}
