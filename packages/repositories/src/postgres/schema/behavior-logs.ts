import { pgTable, bigserial, text, timestamp, json, index } from 'drizzle-orm/pg-core';
import type { BehaviorContext } from '@policyminer/protocol';

/**
 * Behavior logs table - append-only record of agent actions.
 *
 * Design notes:
 * - seq gives the insertion order extraction enumerates in
 * - log_id is not unique; duplicate submissions are separate rows
 * - timestamp keeps the submitted string, occurred_at is its parsed form for filtering
 * - context is json, not jsonb: jsonb reorders object keys, and key order is
 *   the order antecedents are discovered in
 */
export const behaviorLogs = pgTable(
  'behavior_logs',
  {
    seq: bigserial('seq', { mode: 'number' }).primaryKey(),
    logId: text('log_id').notNull(),
    agentId: text('agent_id').notNull(),
    timestamp: text('timestamp').notNull(),
    occurredAt: timestamp('occurred_at', { withTimezone: true }).notNull(),
    action: text('action').notNull(),
    context: json('context').$type<BehaviorContext>().notNull(),
    outcome: text('outcome').notNull().default('success'),
    ingestedAt: timestamp('ingested_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('behavior_logs_agent_idx').on(table.agentId),
    index('behavior_logs_action_idx').on(table.action),
    index('behavior_logs_occurred_at_idx').on(table.occurredAt),
  ]
);
