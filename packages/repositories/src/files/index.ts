// File persistence for policy sets and behavior logs.

export * from './types.js';
export * from './fs.js';
export * from './policy-set-file.js';
export * from './behavior-log-file.js';
