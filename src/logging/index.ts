/**
 * Logging and run tracing.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  createNullLogger,
  formatLogEntry,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
