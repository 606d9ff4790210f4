// ── Logger ───────────────────────────────────────────────────────────────────
export {
  LOG_LEVELS,
  type LogLevel,
  LOG_FORMATS,
  type LogFormat,
  type LoggerConfig,
  DEFAULT_LOGGER_CONFIG,
  type Logger,
  NULL_LOGGER,
  createLogger,
  type LogEntry,
  BufferLogger,
} from "./logger.ts";

// ── Run Log ──────────────────────────────────────────────────────────────────
export {
  type LogFileWriter,
  NODE_LOG_FILE_WRITER,
  type RunLogEntry,
  type JsonLinesLogOptions,
  JsonLinesLog,
} from "./run-log.ts";
