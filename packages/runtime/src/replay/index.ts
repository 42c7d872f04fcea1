// Replay and determinism

export {
  checkExtractionDeterminism,
  comparePolicySets,
  type DeterminismCheckOptions,
  type DeterminismCheckResult,
} from './determinism.js';
