/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, resetRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
  type LoggerOptions,
} from "./logger.js";
