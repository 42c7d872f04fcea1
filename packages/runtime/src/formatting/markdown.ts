// Markdown policy table

import type { PolicySet } from '@policyminer/protocol';
import { formatFixed } from '../numbers/format.js';
import { DEFAULT_MAX_POLICIES, type RenderOptions } from './text.js';

export function formatPolicySetMarkdown(policySet: PolicySet, options: RenderOptions = {}): string {
  const maxPolicies = options.maxPolicies ?? DEFAULT_MAX_POLICIES;
  const lines = [
    `# ${policySet.name}`,
    '',
    `- **Source logs:** ${policySet.sourceLogs}`,
    `- **Generated at:** ${policySet.generatedAt}`,
    `- **Total policies:** ${policySet.policies.length}`,
    '',
    '| ID | Antecedent | Consequent | Support | Confidence | Lift |',
    '|----|-----------|-----------|---------|------------|------|',
  ];

  for (const policy of policySet.policies.slice(0, Math.max(0, maxPolicies))) {
    const { key, value } = policy.antecedent;
    lines.push(
      `| ${policy.policyId} | ${key}=${value} | ${policy.consequent} ` +
        `| ${formatFixed(policy.support, 4)} | ${formatFixed(policy.confidence, 4)} | ${formatFixed(policy.lift, 4)} |`
    );
  }

  return lines.join('\n');
}
