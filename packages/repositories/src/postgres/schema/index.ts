// Re-export all schema tables
export * from './behavior-logs.js';
export * from './policy-sets.js';
