// Runtime error types

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when a behavior log record violates its invariants.
 */
export class InvalidBehaviorLogError extends ValidationError {
  constructor(field: string, reason: string) {
    super(`Invalid behavior log: ${reason}`, { field, details: { reason } });
    this.name = 'InvalidBehaviorLogError';
  }
}

/**
 * Error when a mined policy violates its invariants.
 */
export class InvalidPolicyError extends ValidationError {
  constructor(field: string, reason: string) {
    super(`Invalid policy: ${reason}`, { field, details: { reason } });
    this.name = 'InvalidPolicyError';
  }
}

/**
 * Error when a policy set document cannot be decoded.
 * `field` is the wire path of the first offending value, when there is one.
 */
export class PolicySetDecodeError extends ValidationError {
  constructor(reason: string, field?: string) {
    super(`Invalid policy set document: ${reason}`, { field, details: { reason } });
    this.name = 'PolicySetDecodeError';
  }
}

/**
 * Error when a stored policy set does not exist.
 */
export class PolicySetNotFoundError extends RuntimeError {
  readonly policySetId: string;

  constructor(policySetId: string) {
    super('POLICY_SET_NOT_FOUND', `Policy set not found: ${policySetId}`);
    this.name = 'PolicySetNotFoundError';
    this.policySetId = policySetId;
  }
}
