// Zod schemas for the wire formats
//
// Behavior logs arrive as NDJSON records; policy sets leave (and come back)
// as JSON documents. Both use snake_case field names on the wire.

import { z } from 'zod';
import type { JsonValue } from '../types/common.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

function requiredString(field: string) {
  return z.string({
    required_error: `${field} is required`,
    invalid_type_error: `${field} must be a string`,
  });
}

/**
 * A string that is trimmed and must not be empty afterwards
 */
function trimmedIdentifier(field: string) {
  return requiredString(field).trim().min(1, `${field} must not be blank`);
}

/**
 * A string that must contain something other than whitespace, kept as is
 */
function nonBlank(field: string) {
  return requiredString(field).refine((value) => value.trim() !== '', {
    message: `${field} must not be blank`,
  });
}

function finiteNumber(field: string) {
  return z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .finite(`${field} must be finite`);
}

function fraction(field: string) {
  return finiteNumber(field)
    .min(0, `${field} must be between 0 and 1`)
    .max(1, `${field} must be between 0 and 1`);
}

export const BehaviorLogRecordSchema = z.object(
  {
    log_id: trimmedIdentifier('log_id'),
    agent_id: trimmedIdentifier('agent_id'),
    timestamp: requiredString('timestamp')
      .refine((value) => !Number.isNaN(Date.parse(value)), {
        message: 'timestamp must be a valid ISO 8601 date string',
      })
      .optional(),
    action: trimmedIdentifier('action'),
    context: z.record(JsonValueSchema).optional(),
    outcome: requiredString('outcome').optional(),
  },
  {
    required_error: 'behavior log record is required',
    invalid_type_error: 'behavior log record must be an object',
  }
);

export const MinedPolicyDocumentSchema = z.object({
  policy_id: nonBlank('policy_id'),
  antecedent: z
    .record(requiredString('antecedent value'), {
      required_error: 'antecedent is required',
      invalid_type_error: 'antecedent must be an object',
    })
    .refine((value) => Object.keys(value).length === 1, {
      message: 'antecedent must have exactly one key',
    }),
  consequent: nonBlank('consequent'),
  support: fraction('support'),
  confidence: fraction('confidence'),
  lift: finiteNumber('lift').min(0, 'lift must not be negative'),
  description: requiredString('description'),
});

export const PolicySetDocumentSchema = z.object(
  {
    name: requiredString('name'),
    source_logs: finiteNumber('source_logs')
      .int('source_logs must be an integer')
      .min(0, 'source_logs must not be negative'),
    policies: z.array(MinedPolicyDocumentSchema, {
      required_error: 'policies is required',
      invalid_type_error: 'policies must be an array',
    }),
    generated_at: requiredString('generated_at'),
  },
  {
    required_error: 'policy set document is required',
    invalid_type_error: 'policy set document must be an object',
  }
);

export type MinedPolicyDocument = z.infer<typeof MinedPolicyDocumentSchema>;
export type PolicySetDocument = z.infer<typeof PolicySetDocumentSchema>;
