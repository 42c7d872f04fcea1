// NDJSON behavior log files.

import { encodeBehaviorLog, stringifyNdjson, type BehaviorLog } from '@policyminer/protocol';
import type { FileWriter } from './types.js';

/**
 * Write behavior logs as NDJSON, one wire record per line, in order.
 */
export async function writeBehaviorLogFile(
  writer: FileWriter,
  filePath: string,
  logs: readonly BehaviorLog[]
): Promise<void> {
  await writer.writeFile(filePath, stringifyNdjson(logs.map(encodeBehaviorLog)));
}
