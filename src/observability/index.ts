// ── Logger ────────────────────────────────────────────────────────────────────
export {
  createLogger,
  BufferLogger,
  DEFAULT_LOGGER_CONFIG,
  LOG_LEVELS,
  LOG_FORMATS,
  type Logger,
  type LoggerConfig,
  type LogLevel,
  type LogFormat,
  type LogEntry,
} from "./logger.ts";
