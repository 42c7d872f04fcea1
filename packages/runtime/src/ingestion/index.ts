// Ingestion module - entry points for behavior logs into the system

export {
  parseBehaviorLogs,
  parseBehaviorLogRecords,
  loadBehaviorLogFile,
  ingestBehaviorLogFile,
  ingestBehaviorLogs,
  type IngestionOptions,
  type SkippedLine,
  type SkippedRecord,
  type ParseBehaviorLogsResult,
  type ParseBehaviorLogRecordsResult,
  type IngestBehaviorLogsResult,
} from './behavior-logs.js';
export { createBehaviorLog } from '../records/behavior-log.js';
