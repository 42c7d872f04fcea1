import { randomUUID } from 'node:crypto';
import { asc, desc, eq, inArray } from 'drizzle-orm';
import type { Id, StoredPolicySet } from '@policyminer/protocol';
import type { DatabaseExecutor } from '../db.js';
import { minedPolicies, policySets } from '../schema/index.js';
import type {
  PolicySetRepository,
  SavePolicySetInput,
  PolicySetFilter,
} from '../../interfaces/index.js';
import {
  chunkRows,
  rowsToStoredPolicySet,
  toMinedPolicyInserts,
  type MinedPolicyRow,
} from './rows.js';

export class PgPolicySetRepository implements PolicySetRepository {
  constructor(private db: DatabaseExecutor) {}

  async save(input: SavePolicySetInput): Promise<StoredPolicySet> {
    const id = input.id ?? randomUUID();
    const { policySet, thresholds } = input;

    // The set and its policies are written together or not at all
    return this.db.transaction(async (tx) => {
      await tx.delete(policySets).where(eq(policySets.id, id));

      const [row] = await tx
        .insert(policySets)
        .values({
          id,
          name: policySet.name,
          sourceLogs: policySet.sourceLogs,
          generatedAt: policySet.generatedAt,
          minSupport: thresholds.minSupport,
          minConfidence: thresholds.minConfidence,
          minLift: thresholds.minLift,
          storedAt: new Date(),
        })
        .returning();

      const policyRows: MinedPolicyRow[] = [];
      for (const chunk of chunkRows(toMinedPolicyInserts(id, policySet.policies))) {
        policyRows.push(...(await tx.insert(minedPolicies).values(chunk).returning()));
      }

      return rowsToStoredPolicySet(row, policyRows);
    });
  }

  async get(id: Id): Promise<StoredPolicySet | null> {
    const [row] = await this.db.select().from(policySets).where(eq(policySets.id, id));
    if (!row) return null;

    const policyRows = await this.db
      .select()
      .from(minedPolicies)
      .where(eq(minedPolicies.policySetId, id))
      .orderBy(asc(minedPolicies.position));

    return rowsToStoredPolicySet(row, policyRows);
  }

  async list(filter: PolicySetFilter = {}): Promise<StoredPolicySet[]> {
    let query = this.db
      .select()
      .from(policySets)
      .where(filter.name !== undefined ? eq(policySets.name, filter.name) : undefined)
      .orderBy(desc(policySets.storedAt), desc(policySets.id))
      .$dynamic();

    if (filter.limit) {
      query = query.limit(filter.limit);
    }

    if (filter.offset) {
      query = query.offset(filter.offset);
    }

    const rows = await query;
    if (rows.length === 0) {
      return [];
    }

    const policyRows = await this.db
      .select()
      .from(minedPolicies)
      .where(
        inArray(
          minedPolicies.policySetId,
          rows.map((r) => r.id)
        )
      )
      .orderBy(asc(minedPolicies.policySetId), asc(minedPolicies.position));

    const bySet = new Map<string, MinedPolicyRow[]>();
    for (const policyRow of policyRows) {
      const group = bySet.get(policyRow.policySetId) ?? [];
      group.push(policyRow);
      bySet.set(policyRow.policySetId, group);
    }

    return rows.map((r) => rowsToStoredPolicySet(r, bySet.get(r.id) ?? []));
  }

  async delete(id: Id): Promise<boolean> {
    // mined_policies rows go with it (on delete cascade)
    const deleted = await this.db
      .delete(policySets)
      .where(eq(policySets.id, id))
      .returning({ id: policySets.id });

    return deleted.length > 0;
  }
}
