export {
  createLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type CreateLoggerOptions,
  type LogContext,
  type LogEntry,
  type LogFormat,
  type LogLevel,
  type Logger
} from "./logger.js";
export {
  EventLog,
  type EventLogQuery,
  type EventLogRecordInput,
  type EventResultSummary,
  type ToolCallStats,
  type ToolInvocationEvent
} from "./event-log.js";
export { isNodeError, writeFileAtomic, writeJsonAtomic } from "./atomic-write.js";
export { isPidAlive } from "./process.js";
export { secondsToMs } from "./time.js";
