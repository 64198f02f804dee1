/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, type RunKind } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
