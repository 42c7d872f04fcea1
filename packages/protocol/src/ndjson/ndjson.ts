// NDJSON (Newline Delimited JSON) helpers
// Behavior logs are exchanged one JSON record per line.

/**
 * One non-blank line of NDJSON content, parsed or not
 */
export type NdjsonEntry =
  | { line: number; ok: true; value: unknown }
  | { line: number; ok: false; error: string };

/**
 * Parse every non-blank line of NDJSON content independently.
 * A malformed line yields an error entry instead of aborting the whole input.
 * Line numbers are 1-based and count blank lines.
 */
export function readNdjsonEntries(content: string): NdjsonEntry[] {
  const entries: NdjsonEntry[] = [];
  const lines = content.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue; // Skip empty lines

    try {
      entries.push({ line: i + 1, ok: true, value: JSON.parse(line) });
    } catch (error) {
      entries.push({
        line: i + 1,
        ok: false,
        error: error instanceof Error ? error.message : 'Unknown parse error',
      });
    }
  }

  return entries;
}

/**
 * Stringify an array of objects to NDJSON format
 */
export function stringifyNdjson<T>(items: readonly T[]): string {
  return items.map((item) => JSON.stringify(item)).join('\n') + (items.length > 0 ? '\n' : '');
}
