import type { DatabaseExecutor } from '../db.js';
import type {
  RepositoryContext,
  TransactionalRepositoryContext,
  TransactionFn,
} from '../../interfaces/index.js';
import { PgBehaviorLogRepository } from './behavior-log-repository.js';
import { PgPolicySetRepository } from './policy-set-repository.js';

/**
 * Create a RepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const { db } = createDatabase({ connectionString: process.env.DATABASE_URL });
 * const repos = createPgRepositoryContext(db);
 *
 * await repos.behaviorLogs.appendMany(logs);
 * ```
 */
export function createPgRepositoryContext(db: DatabaseExecutor): RepositoryContext {
  return {
    behaviorLogs: new PgBehaviorLogRepository(db),
    policySets: new PgPolicySetRepository(db),
  };
}

/**
 * Create a TransactionalRepositoryContext backed by Postgres.
 *
 * Usage:
 * ```ts
 * const repos = createTransactionalPgRepositoryContext(db);
 *
 * // Ingest and mine atomically
 * const stored = await repos.transaction(async (txRepos) => {
 *   await txRepos.behaviorLogs.appendMany(logs);
 *   return minePolicies(txRepos, { name: 'Nightly' });
 * });
 * ```
 */
export function createTransactionalPgRepositoryContext(
  db: DatabaseExecutor
): TransactionalRepositoryContext {
  return new TransactionalPgRepositoryContext(db);
}

class TransactionalPgRepositoryContext implements TransactionalRepositoryContext {
  readonly behaviorLogs: PgBehaviorLogRepository;
  readonly policySets: PgPolicySetRepository;

  constructor(private db: DatabaseExecutor) {
    this.behaviorLogs = new PgBehaviorLogRepository(db);
    this.policySets = new PgPolicySetRepository(db);
  }

  /**
   * Execute a function within a database transaction.
   *
   * - If the function returns successfully, all changes are committed
   * - If the function throws, all changes are rolled back
   */
  async transaction<T>(fn: TransactionFn<T>): Promise<T> {
    return this.db.transaction(async (tx) => fn(createPgRepositoryContext(tx)));
  }
}
