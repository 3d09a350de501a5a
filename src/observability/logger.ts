import pino from "pino";

// ── Log Level ───────────────────────────────────────────────────────────────

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// ── Log Format ──────────────────────────────────────────────────────────────

export const LOG_FORMATS = ["json", "pretty"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

// ── Logger Config ───────────────────────────────────────────────────────────

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
  readonly base?: Record<string, unknown>;
  /** Run log path. Every line is appended here as JSON as well as to stdout. */
  readonly file?: string;
}

export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: "info",
  format: "json",
};

// ── Logger Interface ────────────────────────────────────────────────────────

export interface Logger {
  trace(msg: string, data?: Record<string, unknown>): void;
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
  fatal(msg: string, data?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): Logger;
}

// ── Log Entry (for BufferLogger) ────────────────────────────────────────────

export interface LogEntry {
  readonly level: LogLevel;
  readonly msg: string;
  readonly data?: Record<string, unknown>;
  readonly timestamp: string;
}

// ── PinoAdapter (wraps pino instance) ───────────────────────────────────────

type EmittingLevel = Exclude<LogLevel, "silent">;

class PinoAdapter implements Logger {
  constructor(private readonly pinoInstance: pino.Logger) {}

  private write(
    level: EmittingLevel,
    msg: string,
    data?: Record<string, unknown>,
  ): void {
    if (data) {
      this.pinoInstance[level](data, msg);
    } else {
      this.pinoInstance[level](msg);
    }
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.write("trace", msg, data);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.write("debug", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.write("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.write("warn", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.write("error", msg, data);
  }

  fatal(msg: string, data?: Record<string, unknown>): void {
    this.write("fatal", msg, data);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new PinoAdapter(this.pinoInstance.child(bindings));
  }
}

// ── createLogger Factory ────────────────────────────────────────────────────

export function createLogger(config?: Partial<LoggerConfig>): Logger {
  const merged: LoggerConfig = {
    ...DEFAULT_LOGGER_CONFIG,
    ...config,
  };

  const pinoOptions: pino.LoggerOptions = {
    level: merged.level,
    base: merged.base ?? undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (merged.format === "json" && merged.file === undefined) {
    return new PinoAdapter(pino(pinoOptions));
  }

  const targets: pino.TransportTargetOptions[] = [];

  if (merged.format === "pretty") {
    targets.push({
      target: "pino-pretty",
      level: merged.level,
      options: { destination: 1, translateTime: "SYS:yyyy-mm-dd HH:MM:ss" },
    });
  } else {
    targets.push({
      target: "pino/file",
      level: merged.level,
      options: { destination: 1 },
    });
  }

  if (merged.file !== undefined) {
    targets.push({
      target: "pino/file",
      level: merged.level,
      options: { destination: merged.file, mkdir: true, append: true },
    });
  }

  return new PinoAdapter(pino(pinoOptions, pino.transport({ targets })));
}

// ── BufferLogger (for testing) ──────────────────────────────────────────────

export class BufferLogger implements Logger {
  readonly entries: LogEntry[];
  private readonly bindings: Record<string, unknown>;

  constructor(bindings?: Record<string, unknown>, entries?: LogEntry[]) {
    this.bindings = bindings ?? {};
    // Children share the parent's array so the root sees every entry.
    this.entries = entries ?? [];
  }

  private log(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
    const merged = Object.keys(this.bindings).length > 0
      ? { ...this.bindings, ...data }
      : data;

    this.entries.push({
      level,
      msg,
      data: merged,
      timestamp: new Date().toISOString(),
    });
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.log("trace", msg, data);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.log("debug", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.log("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.log("warn", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.log("error", msg, data);
  }

  fatal(msg: string, data?: Record<string, unknown>): void {
    this.log("fatal", msg, data);
  }

  child(bindings: Record<string, unknown>): BufferLogger {
    return new BufferLogger({ ...this.bindings, ...bindings }, this.entries);
  }

  clear(): void {
    this.entries.length = 0;
  }

  getByLevel(level: LogLevel): readonly LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  has(level: LogLevel, msgSubstring: string): boolean {
    return this.entries.some(
      (e) => e.level === level && e.msg.includes(msgSubstring),
    );
  }
}
