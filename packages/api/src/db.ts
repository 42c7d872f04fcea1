// Repository context selection
//
// Supports two modes:
// - In-memory (default): Fast, no setup required
// - Postgres: Set DATABASE_URL environment variable

import {
  postgres,
  memory,
  type TransactionalRepositoryContext,
} from '@policyminer/repositories';
import type { ApiConfig } from './config.js';

type Client = ReturnType<typeof postgres.createDatabase>['client'];

// Singletons
let clientInstance: Client | null = null;
let repos: TransactionalRepositoryContext | null = null;

/**
 * Get the process-wide repository context.
 * Uses Postgres when a database URL is configured, in-memory otherwise.
 */
export function getRepositoryContext(config: Pick<ApiConfig, 'databaseUrl'>): TransactionalRepositoryContext {
  if (!repos) {
    if (config.databaseUrl) {
      const { db, client } = postgres.createDatabase({
        connectionString: config.databaseUrl,
      });
      clientInstance = client;
      repos = postgres.createTransactionalPgRepositoryContext(db);
    } else {
      repos = memory.createInMemoryRepositoryContext();
    }
  }

  return repos;
}

/**
 * Close the database connection, if any, and forget the context.
 */
export async function closeDb(): Promise<void> {
  if (clientInstance) {
    await clientInstance.end();
    clientInstance = null;
  }
  repos = null;
}

export type { TransactionalRepositoryContext };
