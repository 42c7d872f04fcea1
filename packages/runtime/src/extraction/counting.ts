// Frequency counting
//
// One pass over the logs builds three tables: how often each action occurs,
// how many records carry each (key, value) pair, and how many carry each
// (key, value, action) triple. Map insertion order is the enumeration order
// of candidates, so iteration follows first sighting in the input.

import type { BehaviorLog } from '@policyminer/protocol';
import { coerceContextValue, type ContextValueCoercion } from './coercion.js';

export type AntecedentCount = {
  key: string;
  value: string;
  count: number;
};

export type CooccurrenceCount = {
  key: string;
  value: string;
  action: string;
  count: number;
};

export type FrequencyTables = {
  /** Number of logs counted */
  total: number;
  actions: Map<string, number>;
  antecedents: Map<string, AntecedentCount>;
  cooccurrences: Map<string, CooccurrenceCount>;
};

export function createFrequencyTables(): FrequencyTables {
  return {
    total: 0,
    actions: new Map(),
    antecedents: new Map(),
    cooccurrences: new Map(),
  };
}

// Composite map keys. JSON arrays keep components apart whatever they contain.
export function antecedentId(key: string, value: string): string {
  return JSON.stringify([key, value]);
}

export function cooccurrenceId(key: string, value: string, action: string): string {
  return JSON.stringify([key, value, action]);
}

function addAntecedent(tables: FrequencyTables, key: string, value: string, count: number): void {
  const id = antecedentId(key, value);
  const entry = tables.antecedents.get(id);
  if (entry) {
    entry.count += count;
  } else {
    tables.antecedents.set(id, { key, value, count });
  }
}

function addCooccurrence(
  tables: FrequencyTables,
  key: string,
  value: string,
  action: string,
  count: number
): void {
  const id = cooccurrenceId(key, value, action);
  const entry = tables.cooccurrences.get(id);
  if (entry) {
    entry.count += count;
  } else {
    tables.cooccurrences.set(id, { key, value, action, count });
  }
}

/**
 * Count actions, antecedents and co-occurrences over logs in input order.
 */
export function countOccurrences(
  logs: readonly BehaviorLog[],
  coerceValue: ContextValueCoercion = coerceContextValue
): FrequencyTables {
  const tables = createFrequencyTables();

  for (const log of logs) {
    tables.total += 1;
    tables.actions.set(log.action, (tables.actions.get(log.action) ?? 0) + 1);

    for (const [key, raw] of Object.entries(log.context)) {
      const value = coerceValue(raw);
      addAntecedent(tables, key, value, 1);
      addCooccurrence(tables, key, value, log.action, 1);
    }
  }

  return tables;
}

/**
 * Merge tables from separate scans by addition.
 * Entries of `first` keep their order; entries only in `second` follow.
 */
export function mergeFrequencyTables(first: FrequencyTables, second: FrequencyTables): FrequencyTables {
  const merged = createFrequencyTables();

  for (const tables of [first, second]) {
    merged.total += tables.total;
    for (const [action, count] of tables.actions) {
      merged.actions.set(action, (merged.actions.get(action) ?? 0) + count);
    }
    for (const entry of tables.antecedents.values()) {
      addAntecedent(merged, entry.key, entry.value, entry.count);
    }
    for (const entry of tables.cooccurrences.values()) {
      addCooccurrence(merged, entry.key, entry.value, entry.action, entry.count);
    }
  }

  return merged;
}
