// @policyminer/protocol
// Types, wire schemas and codecs shared by every package

export * from './types/index.js';

export {
  type ValidationIssue,
  type ValidationIssueCode,
  type ValidationResult,
  formatIssuePath,
  toValidationIssues,
} from './validation/results.js';

export {
  JsonValueSchema,
  BehaviorLogRecordSchema,
  MinedPolicyDocumentSchema,
  PolicySetDocumentSchema,
  type MinedPolicyDocument,
  type PolicySetDocument,
} from './validation/schemas.js';

export {
  validateBehaviorLogRecord,
  encodeBehaviorLog,
  type ValidateBehaviorLogOptions,
} from './validation/behavior-logs.js';

export {
  encodeMinedPolicy,
  encodePolicySet,
  validateMinedPolicyDocument,
  validatePolicySetDocument,
} from './documents/policy-set.js';

export { readNdjsonEntries, stringifyNdjson, type NdjsonEntry } from './ndjson/ndjson.js';
