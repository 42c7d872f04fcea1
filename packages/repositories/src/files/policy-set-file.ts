// JSON policy set files.
// A policy set file holds one pretty-printed policy set document.

import {
  encodePolicySet,
  validatePolicySetDocument,
  type PolicySet,
  type ValidationIssue,
} from '@policyminer/protocol';
import type { FileReader, FileWriter } from './types.js';

/**
 * Error thrown when a policy set file cannot be read back into a PolicySet.
 */
export class PolicySetFileError extends Error {
  readonly filePath: string;
  readonly issues: ValidationIssue[];

  constructor(filePath: string, reason: string, issues: ValidationIssue[] = []) {
    super(`Invalid policy set file "${filePath}": ${reason}`);
    this.name = 'PolicySetFileError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

/**
 * Render a policy set as the JSON text stored in files (2-space indent).
 */
export function stringifyPolicySetFile(policySet: PolicySet): string {
  return JSON.stringify(encodePolicySet(policySet), null, 2) + '\n';
}

/**
 * Write a policy set to a JSON file.
 */
export async function writePolicySetFile(
  writer: FileWriter,
  filePath: string,
  policySet: PolicySet
): Promise<void> {
  await writer.writeFile(filePath, stringifyPolicySetFile(policySet));
}

/**
 * Read a policy set from a JSON file.
 *
 * @throws PolicySetFileError if the content is not JSON or not a valid document
 */
export async function readPolicySetFile(reader: FileReader, filePath: string): Promise<PolicySet> {
  const content = await reader.readFile(filePath);

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new PolicySetFileError(
      filePath,
      error instanceof Error ? error.message : 'Unknown parse error'
    );
  }

  const result = validatePolicySetDocument(data);
  if (!result.valid) {
    const [first] = result.errors;
    const location = first.path === '' ? 'document' : first.path;
    throw new PolicySetFileError(filePath, `${location}: ${first.message}`, result.errors);
  }

  return result.value;
}
