// Plain-text policy report

import type { PolicySet } from '@policyminer/protocol';
import { formatFixed } from '../numbers/format.js';

export const DEFAULT_MAX_POLICIES = 50;

export type RenderOptions = {
  /** Maximum number of policies to include (default 50) */
  maxPolicies?: number;
};

export function formatPolicySetText(policySet: PolicySet, options: RenderOptions = {}): string {
  const maxPolicies = options.maxPolicies ?? DEFAULT_MAX_POLICIES;
  const lines = [
    `Policy Set: ${policySet.name}`,
    `Source logs: ${policySet.sourceLogs}`,
    `Generated at: ${policySet.generatedAt}`,
    `Total policies: ${policySet.policies.length}`,
    '-'.repeat(60),
  ];

  for (const policy of policySet.policies.slice(0, Math.max(0, maxPolicies))) {
    lines.push(`[${policy.policyId}] ${policy.description}`);
    lines.push(
      `  support=${formatFixed(policy.support, 4)} ` +
        `confidence=${formatFixed(policy.confidence, 4)} ` +
        `lift=${formatFixed(policy.lift, 4)}`
    );
  }

  return lines.join('\n');
}
