export {
  createConsoleLogger,
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  LOG_LEVELS,
  type MinerLogger,
  type LogLevel,
  type LogEntry,
} from './logger.js';
