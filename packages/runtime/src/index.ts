// @policyminer/runtime
// Policy extraction, ingestion, rendering and the mining workflow

// Error types
export {
  RuntimeError,
  ValidationError,
  InvalidBehaviorLogError,
  InvalidPolicyError,
  PolicySetDecodeError,
  PolicySetNotFoundError,
} from './errors.js';

// Logging
export {
  createConsoleLogger,
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  LOG_LEVELS,
  type MinerLogger,
  type LogLevel,
  type LogEntry,
} from './logging/index.js';

// Number formatting
export { formatFixed, roundTo } from './numbers/index.js';

// Record construction
export {
  createBehaviorLog,
  createMinedPolicy,
  createPolicySet,
  type CreateMinedPolicyInput,
  type CreatePolicySetInput,
} from './records/index.js';

// Extraction (counting → scoring → filtering → ranking)
export {
  PolicyExtractor,
  extractPolicies,
  formatPolicyId,
  sortByConfidence,
  coerceContextValue,
  quoteText,
  countOccurrences,
  mergeFrequencyTables,
  createFrequencyTables,
  scoreCandidates,
  failedThreshold,
  describeRule,
  type PolicyExtractorOptions,
  type ExtractOptions,
  type ContextValueCoercion,
  type FrequencyTables,
  type AntecedentCount,
  type CooccurrenceCount,
  type RuleCandidate,
} from './extraction/index.js';

// Policy sets: top-N view and codec
export {
  topPolicies,
  DEFAULT_TOP_COUNT,
  decodePolicySet,
  serializePolicySet,
  parsePolicySet,
} from './policy-sets/index.js';

// Determinism
export {
  checkExtractionDeterminism,
  comparePolicySets,
  type DeterminismCheckOptions,
  type DeterminismCheckResult,
} from './replay/index.js';

// Ingestion
export {
  parseBehaviorLogs,
  parseBehaviorLogRecords,
  loadBehaviorLogFile,
  ingestBehaviorLogFile,
  ingestBehaviorLogs,
  type IngestionOptions,
  type SkippedLine,
  type SkippedRecord,
  type ParseBehaviorLogsResult,
  type ParseBehaviorLogRecordsResult,
  type IngestBehaviorLogsResult,
} from './ingestion/index.js';

// Rendering
export {
  formatPolicySetText,
  formatPolicySetMarkdown,
  DEFAULT_MAX_POLICIES,
  type RenderOptions,
} from './formatting/index.js';

// Mining workflow
export { minePolicies, type MinePoliciesOptions } from './mining/index.js';
