// Validation result shapes shared by the wire schemas

import type { ZodError, ZodIssue } from 'zod';

/**
 * Validation error codes
 */
export type ValidationIssueCode = 'MISSING_FIELD' | 'INVALID_TYPE' | 'INVALID_VALUE';

/**
 * A validation error with the path of the offending field.
 * The path uses wire field names, e.g. "policies[2].support".
 * An empty path refers to the value as a whole.
 */
export type ValidationIssue = {
  path: string;
  message: string;
  code: ValidationIssueCode;
};

/**
 * Result of validating a wire value into its domain form
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: ValidationIssue[] };

/**
 * Render a zod issue path as "a.b[0].c"
 */
export function formatIssuePath(path: readonly (string | number)[]): string {
  let result = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      result += `[${segment}]`;
    } else {
      result += result === '' ? segment : `.${segment}`;
    }
  }
  return result;
}

function issueCode(issue: ZodIssue): ValidationIssueCode {
  if (issue.code === 'invalid_type') {
    return issue.received === 'undefined' ? 'MISSING_FIELD' : 'INVALID_TYPE';
  }
  return 'INVALID_VALUE';
}

/**
 * Convert a ZodError into validation issues, in the order zod reported them.
 */
export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: formatIssuePath(issue.path),
    message: issue.message,
    code: issueCode(issue),
  }));
}
