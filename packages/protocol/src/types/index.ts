// Re-export all protocol types

export * from './common.js';
export * from './behavior-logs.js';
export * from './policies.js';
