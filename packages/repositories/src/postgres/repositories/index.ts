export { PgBehaviorLogRepository } from './behavior-log-repository.js';
export { PgPolicySetRepository } from './policy-set-repository.js';
export {
  createPgRepositoryContext,
  createTransactionalPgRepositoryContext,
} from './context.js';
export {
  chunkRows,
  INSERT_CHUNK_SIZE,
  toBehaviorLogInsert,
  rowToBehaviorLog,
  toMinedPolicyInserts,
  rowToMinedPolicy,
  rowsToStoredPolicySet,
} from './rows.js';
