import {
  pgTable,
  text,
  timestamp,
  integer,
  doublePrecision,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Policy sets table - one row per extraction run.
 * The thresholds the run used are kept alongside the result.
 */
export const policySets = pgTable(
  'policy_sets',
  {
    id: text('id').primaryKey(),
    name: text('name').notNull(),
    sourceLogs: integer('source_logs').notNull(),
    generatedAt: text('generated_at').notNull(),
    minSupport: doublePrecision('min_support').notNull(),
    minConfidence: doublePrecision('min_confidence').notNull(),
    minLift: doublePrecision('min_lift').notNull(),
    storedAt: timestamp('stored_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('policy_sets_name_idx').on(table.name),
    index('policy_sets_stored_at_idx').on(table.storedAt),
  ]
);

/**
 * Mined policies table - the ordered policies of a set.
 * position is the index in the set's policy sequence; order is significant.
 */
export const minedPolicies = pgTable(
  'mined_policies',
  {
    policySetId: text('policy_set_id')
      .notNull()
      .references(() => policySets.id, { onDelete: 'cascade' }),
    position: integer('position').notNull(),
    policyId: text('policy_id').notNull(),
    antecedentKey: text('antecedent_key').notNull(),
    antecedentValue: text('antecedent_value').notNull(),
    consequent: text('consequent').notNull(),
    support: doublePrecision('support').notNull(),
    confidence: doublePrecision('confidence').notNull(),
    lift: doublePrecision('lift').notNull(),
    description: text('description').notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.policySetId, table.position] }),
    index('mined_policies_consequent_idx').on(table.consequent),
  ]
);
