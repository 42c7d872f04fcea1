// Mining workflow: stored behavior logs → extraction → stored policy set

import type { StoredPolicySet } from '@policyminer/protocol';
import type { BehaviorLogFilter, RepositoryContext } from '@policyminer/repositories';
import { PolicyExtractor, type PolicyExtractorOptions } from '../extraction/index.js';
import { silentLogger } from '../logging/index.js';

export type MinePoliciesOptions = PolicyExtractorOptions & {
  name?: string;

  /**
   * Which stored logs to mine (limit and offset are ignored)
   */
  filter?: Omit<BehaviorLogFilter, 'limit' | 'offset'>;

  generatedAt?: string;
};

/**
 * Mine the stored behavior logs and save the resulting policy set.
 */
export async function minePolicies(
  repos: RepositoryContext,
  options: MinePoliciesOptions = {}
): Promise<StoredPolicySet> {
  const { name, filter, generatedAt, ...extractorOptions } = options;
  const logger = extractorOptions.logger ?? silentLogger;

  const logs = await repos.behaviorLogs.list({
    agentId: filter?.agentId,
    action: filter?.action,
    since: filter?.since,
    until: filter?.until,
  });

  const extractor = new PolicyExtractor(extractorOptions);
  const policySet = extractor.extract(logs, { name, generatedAt });

  const stored = await repos.policySets.save({
    policySet,
    thresholds: { ...extractor.thresholds },
  });

  logger.info('Mined policy set', {
    id: stored.id,
    name: policySet.name,
    sourceLogs: policySet.sourceLogs,
    policies: policySet.policies.length,
    thresholds: stored.thresholds,
  });

  return stored;
}
