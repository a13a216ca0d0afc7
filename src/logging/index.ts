/**
 * Logging utilities.
 */

export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  silentLogger,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
