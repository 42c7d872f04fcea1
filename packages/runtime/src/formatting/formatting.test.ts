// Tests for policy set rendering

import { describe, it, expect } from 'vitest';
import type { PolicySet } from '@policyminer/protocol';
import { formatPolicySetMarkdown, formatPolicySetText } from './index.js';

const policySet: PolicySet = {
  name: 'Ops Policies',
  sourceLogs: 12,
  generatedAt: '2024-06-01T00:00:00.000Z',
  policies: [
    {
      policyId: 'policy_0001',
      antecedent: { key: 'env', value: 'prod' },
      consequent: 'deploy',
      support: 0.5,
      confidence: 0.857143,
      lift: 1.285714,
      description: "When env='prod', agents perform 'deploy' with 85.7% confidence (support=50.0%, lift=1.29)",
    },
    {
      policyId: 'policy_0002',
      antecedent: { key: 'team', value: 'ops' },
      consequent: 'deploy',
      support: 0.5,
      confidence: 0.666667,
      lift: 1,
      description: "When team='ops', agents perform 'deploy' with 66.7% confidence (support=50.0%, lift=1.00)",
    },
  ],
};

describe('formatPolicySetText', () => {
  it('renders a header and two lines per policy', () => {
    expect(formatPolicySetText(policySet).split('\n')).toEqual([
      'Policy Set: Ops Policies',
      'Source logs: 12',
      'Generated at: 2024-06-01T00:00:00.000Z',
      'Total policies: 2',
      '-'.repeat(60),
      "[policy_0001] When env='prod', agents perform 'deploy' with 85.7% confidence (support=50.0%, lift=1.29)",
      '  support=0.5000 confidence=0.8571 lift=1.2857',
      "[policy_0002] When team='ops', agents perform 'deploy' with 66.7% confidence (support=50.0%, lift=1.00)",
      '  support=0.5000 confidence=0.6667 lift=1.0000',
    ]);
  });

  it('truncates to maxPolicies but reports the full total', () => {
    const lines = formatPolicySetText(policySet, { maxPolicies: 1 }).split('\n');

    expect(lines).toHaveLength(7);
    expect(lines[3]).toBe('Total policies: 2');
  });
});

describe('formatPolicySetMarkdown', () => {
  it('renders a table', () => {
    expect(formatPolicySetMarkdown(policySet).split('\n')).toEqual([
      '# Ops Policies',
      '',
      '- **Source logs:** 12',
      '- **Generated at:** 2024-06-01T00:00:00.000Z',
      '- **Total policies:** 2',
      '',
      '| ID | Antecedent | Consequent | Support | Confidence | Lift |',
      '|----|-----------|-----------|---------|------------|------|',
      '| policy_0001 | env=prod | deploy | 0.5000 | 0.8571 | 1.2857 |',
      '| policy_0002 | team=ops | deploy | 0.5000 | 0.6667 | 1.0000 |',
    ]);
  });

  it('renders only the header for an empty set', () => {
    const markdown = formatPolicySetMarkdown({ ...policySet, policies: [] });

    expect(markdown.split('\n')).toHaveLength(8);
    expect(markdown).toContain('- **Total policies:** 0');
  });
});
