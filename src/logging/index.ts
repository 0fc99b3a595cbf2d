/**
 * Logging utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
