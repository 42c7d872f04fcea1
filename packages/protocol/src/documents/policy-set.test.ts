// Tests for the PolicySet document codec

import { describe, it, expect } from 'vitest';
import type { PolicySet } from '../types/policies.js';
import {
  encodePolicySet,
  encodeMinedPolicy,
  validatePolicySetDocument,
  validateMinedPolicyDocument,
} from './policy-set.js';

const policySet: PolicySet = {
  name: 'Weekly review',
  sourceLogs: 10,
  generatedAt: '2024-05-01T12:00:00.000Z',
  policies: [
    {
      policyId: 'policy_0001',
      antecedent: { key: 'role', value: 'admin' },
      consequent: 'read',
      support: 0.7,
      confidence: 1,
      lift: 1.428571,
      description:
        "When role='admin', agents perform 'read' with 100.0% confidence (support=70.0%, lift=1.43)",
    },
    {
      policyId: 'policy_0002',
      antecedent: { key: 'team', value: 'ops' },
      consequent: 'write',
      support: 0.2,
      confidence: 0.666667,
      lift: 2.222222,
      description:
        "When team='ops', agents perform 'write' with 66.7% confidence (support=20.0%, lift=2.22)",
    },
  ],
};

function validPolicyDocument() {
  return {
    policy_id: 'policy_0001',
    antecedent: { role: 'admin' },
    consequent: 'read',
    support: 0.5,
    confidence: 0.8,
    lift: 1.2,
    description: 'text',
  };
}

describe('encodePolicySet', () => {
  it('writes exactly the document fields', () => {
    const document = encodePolicySet(policySet);

    expect(Object.keys(document)).toEqual(['name', 'source_logs', 'policies', 'generated_at']);
    expect(document.source_logs).toBe(10);
    expect(document.generated_at).toBe('2024-05-01T12:00:00.000Z');
    expect(document.policies[1]).toEqual({
      policy_id: 'policy_0002',
      antecedent: { team: 'ops' },
      consequent: 'write',
      support: 0.2,
      confidence: 0.666667,
      lift: 2.222222,
      description:
        "When team='ops', agents perform 'write' with 66.7% confidence (support=20.0%, lift=2.22)",
    });
  });

  it('writes the antecedent as a single-key object', () => {
    expect(encodeMinedPolicy(policySet.policies[0]).antecedent).toEqual({ role: 'admin' });
  });
});

describe('validatePolicySetDocument', () => {
  it('round-trips through JSON with order preserved', () => {
    const text = JSON.stringify(encodePolicySet(policySet));
    const result = validatePolicySetDocument(JSON.parse(text));

    expect(result).toEqual({ valid: true, value: policySet });
    if (result.valid) {
      expect(result.value.policies.map((p) => p.policyId)).toEqual(['policy_0001', 'policy_0002']);
    }
  });

  it('accepts an empty policy list', () => {
    const result = validatePolicySetDocument({
      name: 'empty',
      source_logs: 0,
      policies: [],
      generated_at: '2024-05-01T12:00:00.000Z',
    });

    expect(result.valid).toBe(true);
  });

  it('fails on a missing field', () => {
    const result = validatePolicySetDocument({ name: 'x', source_logs: 1, policies: [] });

    expect(result).toEqual({
      valid: false,
      errors: [{ path: 'generated_at', message: 'generated_at is required', code: 'MISSING_FIELD' }],
    });
  });

  it('fails on a negative source_logs', () => {
    const result = validatePolicySetDocument({
      name: 'x',
      source_logs: -1,
      policies: [],
      generated_at: 'now',
    });

    expect(result).toEqual({
      valid: false,
      errors: [
        { path: 'source_logs', message: 'source_logs must not be negative', code: 'INVALID_VALUE' },
      ],
    });
  });

  it('fails on a fractional source_logs', () => {
    const result = validatePolicySetDocument({
      name: 'x',
      source_logs: 2.5,
      policies: [],
      generated_at: 'now',
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0].message).toBe('source_logs must be an integer');
    }
  });

  it('points at the offending policy field', () => {
    const result = validatePolicySetDocument({
      name: 'x',
      source_logs: 4,
      policies: [validPolicyDocument(), { ...validPolicyDocument(), support: 1.5 }],
      generated_at: 'now',
    });

    expect(result).toEqual({
      valid: false,
      errors: [
        {
          path: 'policies[1].support',
          message: 'support must be between 0 and 1',
          code: 'INVALID_VALUE',
        },
      ],
    });
  });

  it('rejects a non-object document', () => {
    const result = validatePolicySetDocument(null);

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0].code).toBe('INVALID_TYPE');
      expect(result.errors[0].path).toBe('');
    }
  });
});

describe('validateMinedPolicyDocument', () => {
  it('converts the antecedent object to key and value', () => {
    const result = validateMinedPolicyDocument(validPolicyDocument());

    expect(result.valid).toBe(true);
    if (result.valid) {
      expect(result.value.antecedent).toEqual({ key: 'role', value: 'admin' });
      expect(result.value.policyId).toBe('policy_0001');
    }
  });

  it('requires exactly one antecedent key', () => {
    const result = validateMinedPolicyDocument({
      ...validPolicyDocument(),
      antecedent: { role: 'admin', team: 'ops' },
    });

    expect(result).toEqual({
      valid: false,
      errors: [
        {
          path: 'antecedent',
          message: 'antecedent must have exactly one key',
          code: 'INVALID_VALUE',
        },
      ],
    });
  });

  it('rejects a negative lift', () => {
    const result = validateMinedPolicyDocument({ ...validPolicyDocument(), lift: -0.1 });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0]).toEqual({
        path: 'lift',
        message: 'lift must not be negative',
        code: 'INVALID_VALUE',
      });
    }
  });

  it('rejects a blank consequent', () => {
    const result = validateMinedPolicyDocument({ ...validPolicyDocument(), consequent: ' ' });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors[0].path).toBe('consequent');
    }
  });
});
