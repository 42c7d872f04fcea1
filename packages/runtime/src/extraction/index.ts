export {
  PolicyExtractor,
  extractPolicies,
  formatPolicyId,
  sortByConfidence,
  type PolicyExtractorOptions,
  type ExtractOptions,
} from './extractor.js';
export { coerceContextValue, quoteText, type ContextValueCoercion } from './coercion.js';
export {
  countOccurrences,
  mergeFrequencyTables,
  createFrequencyTables,
  type FrequencyTables,
  type AntecedentCount,
  type CooccurrenceCount,
} from './counting.js';
export { scoreCandidates, failedThreshold, type RuleCandidate } from './scoring.js';
export { describeRule } from './description.js';
