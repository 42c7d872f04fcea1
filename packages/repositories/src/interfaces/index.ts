// Repository interfaces
// These define the contracts for data access, enabling substrate independence.

export type {
  BehaviorLogRepository,
  BehaviorLogFilter,
} from './behavior-log-repository.js';

export type {
  PolicySetRepository,
  SavePolicySetInput,
  PolicySetFilter,
} from './policy-set-repository.js';

export type {
  RepositoryContext,
  TransactionFn,
  TransactionalRepositoryContext,
} from './repository-context.js';
