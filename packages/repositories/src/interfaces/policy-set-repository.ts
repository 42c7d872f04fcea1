import type {
  ExtractionThresholds,
  Id,
  PolicySet,
  StoredPolicySet,
} from '@policyminer/protocol';

/**
 * Input for saving a PolicySet
 */
export type SavePolicySetInput = {
  id?: Id;
  policySet: PolicySet;
  thresholds: ExtractionThresholds;
};

/**
 * Filter for listing stored PolicySets
 */
export type PolicySetFilter = {
  name?: string;
  limit?: number;
  offset?: number;
};

/**
 * Repository interface for mined PolicySets.
 *
 * A stored set is never updated; a new extraction run saves a new set.
 * Policies come back in the order they were saved.
 */
export interface PolicySetRepository {
  /**
   * Save a PolicySet with the thresholds that produced it
   */
  save(input: SavePolicySetInput): Promise<StoredPolicySet>;

  /**
   * Get a stored PolicySet by ID
   * @returns StoredPolicySet or null if not found
   */
  get(id: Id): Promise<StoredPolicySet | null>;

  /**
   * List stored PolicySets, newest first
   */
  list(filter?: PolicySetFilter): Promise<StoredPolicySet[]>;

  /**
   * Delete a stored PolicySet and its policies
   * @returns true if something was deleted
   */
  delete(id: Id): Promise<boolean>;
}
