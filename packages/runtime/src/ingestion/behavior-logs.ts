// Behavior log ingestion - the entry point for recorded agent actions
//
// Input arrives as NDJSON. Each line is validated on its own: a malformed or
// invalid line is skipped and reported, the rest of the input still loads.

import {
  readNdjsonEntries,
  validateBehaviorLogRecord,
  type BehaviorLog,
  type ValidationIssue,
} from '@policyminer/protocol';
import type { RepositoryContext, files } from '@policyminer/repositories';
import { silentLogger, type MinerLogger } from '../logging/index.js';

export type IngestionOptions = {
  logger?: MinerLogger;

  /**
   * Clock for records without a timestamp (defaults to the system clock)
   */
  now?: () => Date;
};

export type SkippedLine = {
  /** 1-based line number in the content */
  line: number;
  reason: string;
};

export type SkippedRecord = {
  /** 0-based position in the input array */
  index: number;
  reason: string;
};

export type ParseBehaviorLogsResult = {
  logs: BehaviorLog[];
  skipped: SkippedLine[];
};

export type ParseBehaviorLogRecordsResult = {
  logs: BehaviorLog[];
  skipped: SkippedRecord[];
};

export type IngestBehaviorLogsResult = {
  /** Logs appended to the repository */
  accepted: number;
  skipped: SkippedLine[];
};

function describeIssue(issue: ValidationIssue): string {
  return issue.path === '' ? issue.message : `${issue.path}: ${issue.message}`;
}

/**
 * Parse NDJSON content into behavior logs, skipping blank lines and lines
 * that are not JSON or fail validation.
 */
export function parseBehaviorLogs(
  content: string,
  options: IngestionOptions = {}
): ParseBehaviorLogsResult {
  const logger = options.logger ?? silentLogger;
  const logs: BehaviorLog[] = [];
  const skipped: SkippedLine[] = [];

  for (const entry of readNdjsonEntries(content)) {
    if (!entry.ok) {
      const reason = `invalid JSON: ${entry.error}`;
      logger.warn('Skipping malformed behavior log line', { line: entry.line, reason });
      skipped.push({ line: entry.line, reason });
      continue;
    }

    const result = validateBehaviorLogRecord(entry.value, { now: options.now });
    if (!result.valid) {
      const reason = describeIssue(result.errors[0]);
      logger.warn('Skipping invalid behavior log line', { line: entry.line, reason });
      skipped.push({ line: entry.line, reason });
      continue;
    }

    logs.push(result.value);
  }

  return { logs, skipped };
}

/**
 * Validate already-parsed records, skipping the invalid ones.
 */
export function parseBehaviorLogRecords(
  records: readonly unknown[],
  options: IngestionOptions = {}
): ParseBehaviorLogRecordsResult {
  const logger = options.logger ?? silentLogger;
  const logs: BehaviorLog[] = [];
  const skipped: SkippedRecord[] = [];

  records.forEach((record, index) => {
    const result = validateBehaviorLogRecord(record, { now: options.now });
    if (result.valid) {
      logs.push(result.value);
      return;
    }
    const reason = describeIssue(result.errors[0]);
    logger.warn('Skipping invalid behavior log record', { index, reason });
    skipped.push({ index, reason });
  });

  return { logs, skipped };
}

/**
 * Read and parse an NDJSON behavior log file.
 * A missing or unreadable file is an error; bad lines are skipped.
 */
export async function loadBehaviorLogFile(
  reader: files.FileReader,
  filePath: string,
  options: IngestionOptions = {}
): Promise<ParseBehaviorLogsResult> {
  const content = await reader.readFile(filePath);
  const result = parseBehaviorLogs(content, options);

  (options.logger ?? silentLogger).info('Loaded behavior log file', {
    filePath,
    logs: result.logs.length,
    skipped: result.skipped.length,
  });

  return result;
}

/**
 * Read an NDJSON file and append its valid logs to the repository.
 */
export async function ingestBehaviorLogFile(
  repos: RepositoryContext,
  reader: files.FileReader,
  filePath: string,
  options: IngestionOptions = {}
): Promise<IngestBehaviorLogsResult> {
  const { logs, skipped } = await loadBehaviorLogFile(reader, filePath, options);
  const accepted = await repos.behaviorLogs.appendMany(logs);

  (options.logger ?? silentLogger).info('Ingested behavior logs', {
    filePath,
    accepted,
    skipped: skipped.length,
  });

  return { accepted, skipped };
}

/**
 * Parse NDJSON content and append the valid logs to the repository.
 */
export async function ingestBehaviorLogs(
  repos: RepositoryContext,
  content: string,
  options: IngestionOptions = {}
): Promise<IngestBehaviorLogsResult> {
  const { logs, skipped } = parseBehaviorLogs(content, options);
  const accepted = await repos.behaviorLogs.appendMany(logs);

  (options.logger ?? silentLogger).info('Ingested behavior logs', {
    accepted,
    skipped: skipped.length,
  });

  return { accepted, skipped };
}
