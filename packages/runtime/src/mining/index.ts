export { minePolicies, type MinePoliciesOptions } from './run.js';
