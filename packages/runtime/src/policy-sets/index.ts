export { topPolicies, DEFAULT_TOP_COUNT } from './top.js';
export { decodePolicySet, serializePolicySet, parsePolicySet } from './codec.js';
