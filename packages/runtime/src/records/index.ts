export { createBehaviorLog } from './behavior-log.js';
export {
  createMinedPolicy,
  createPolicySet,
  type CreateMinedPolicyInput,
  type CreatePolicySetInput,
} from './policy.js';
