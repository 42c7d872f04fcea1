// Policy set decoding with exceptions
//
// The protocol package validates documents into result objects; these wrap
// it for callers that would rather throw.

import {
  encodePolicySet,
  validatePolicySetDocument,
  type PolicySet,
} from '@policyminer/protocol';
import { PolicySetDecodeError } from '../errors.js';

/**
 * Decode a parsed JSON value into a PolicySet.
 *
 * @throws PolicySetDecodeError with the path of the first offending field
 */
export function decodePolicySet(value: unknown): PolicySet {
  const result = validatePolicySetDocument(value);
  if (!result.valid) {
    const [first] = result.errors;
    const field = first.path === '' ? undefined : first.path;
    throw new PolicySetDecodeError(field ? `${field}: ${first.message}` : first.message, field);
  }
  return result.value;
}

/**
 * Pretty JSON text of the policy set document (2-space indent).
 */
export function serializePolicySet(policySet: PolicySet): string {
  return JSON.stringify(encodePolicySet(policySet), null, 2);
}

/**
 * @throws PolicySetDecodeError when the text is not JSON or not a valid document
 */
export function parsePolicySet(text: string): PolicySet {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new PolicySetDecodeError(error instanceof Error ? error.message : 'malformed JSON');
  }
  return decodePolicySet(value);
}
