export { generateRunId, initRunId, getRunId } from "./run-id.js";
export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
  type LogSink,
  type LoggerOptions,
} from "./logger.js";
