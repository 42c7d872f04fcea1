// Common types used across the protocol

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * String identifier
 */
export type Id = string;

/**
 * Any value that survives a JSON round trip.
 * Behavior log context values are arbitrary JSON.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Pagination shared by repository filters
 */
export type Page = {
  limit?: number;
  offset?: number;
};
