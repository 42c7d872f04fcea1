// Context value coercion
//
// Antecedents compare context values by their text form. Every value goes
// through one coercion function before it is counted, so the rule for what
// counts as "the same value" lives in one place and can be swapped per run.

import type { JsonValue } from '@policyminer/protocol';

/**
 * Turns a raw context value into the text used as an antecedent value.
 */
export type ContextValueCoercion = (value: JsonValue) => string;

/**
 * Default coercion: strings unchanged, numbers and booleans in their
 * canonical JavaScript form, null as "null", arrays and objects as JSON.
 * No case or whitespace normalization.
 */
export const coerceContextValue: ContextValueCoercion = (value) => {
  if (typeof value === 'string') {
    return value;
  }
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
};

const ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

// Control, format, separator, private-use and unassigned code points, except
// the plain space.
const NON_PRINTABLE = /^(?! )[\p{C}\p{Z}]$/u;

function escapeCodePoint(char: string): string {
  const code = char.codePointAt(0) ?? 0;
  if (code < 0x100) {
    return `\\x${code.toString(16).padStart(2, '0')}`;
  }
  if (code < 0x10000) {
    return `\\u${code.toString(16).padStart(4, '0')}`;
  }
  return `\\U${code.toString(16).padStart(8, '0')}`;
}

/**
 * Quote text the way a string literal is printed: single quotes unless the
 * text contains a single quote and no double quote. Non-printable code
 * points are written as \xNN, \uNNNN or \UNNNNNNNN.
 */
export function quoteText(text: string): string {
  const quote = text.includes("'") && !text.includes('"') ? '"' : "'";
  let escaped = '';
  for (const char of text) {
    if (char === quote) {
      escaped += `\\${char}`;
    } else {
      escaped += ESCAPES[char] ?? (NON_PRINTABLE.test(char) ? escapeCodePoint(char) : char);
    }
  }
  return `${quote}${escaped}${quote}`;
}
