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

type EmitLevel = Exclude<LogLevel, "silent">;

// ── Log Format ──────────────────────────────────────────────────────────────

export const LOG_FORMATS = ["json", "pretty"] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

// ── Logger Config ───────────────────────────────────────────────────────────

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly format: LogFormat;
  readonly base?: Record<string, unknown>;
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

// ── Null Logger ─────────────────────────────────────────────────────────────
// Default for engines constructed without a logger.

export const NULL_LOGGER: Logger = {
  trace: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => NULL_LOGGER,
};

// ── PinoAdapter ─────────────────────────────────────────────────────────────

class PinoAdapter implements Logger {
  constructor(private readonly instance: pino.Logger) {}

  private write(level: EmitLevel, msg: string, data?: Record<string, unknown>): void {
    if (data) {
      this.instance[level](data, msg);
    } else {
      this.instance[level](msg);
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
    return new PinoAdapter(this.instance.child(bindings));
  }
}

// ── createLogger Factory ────────────────────────────────────────────────────

export function createLogger(config?: Partial<LoggerConfig>): Logger {
  const merged: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG, ...config };

  const options: pino.LoggerOptions = {
    level: merged.level,
    base: merged.base ?? undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  const instance =
    merged.format === "pretty"
      ? pino(options, pino.transport({ target: "pino-pretty" }))
      : pino(options);

  return new PinoAdapter(instance);
}

// ── BufferLogger (for tests) ────────────────────────────────────────────────

export interface LogEntry {
  readonly level: EmitLevel;
  readonly msg: string;
  readonly data?: Record<string, unknown>;
  readonly timestamp: string;
}

export class BufferLogger implements Logger {
  private constructor(
    readonly entries: LogEntry[],
    private readonly bindings: Record<string, unknown>,
  ) {}

  static create(bindings: Record<string, unknown> = {}): BufferLogger {
    return new BufferLogger([], bindings);
  }

  private record(level: EmitLevel, msg: string, data?: Record<string, unknown>): void {
    const merged =
      Object.keys(this.bindings).length > 0 ? { ...this.bindings, ...data } : data;
    this.entries.push({ level, msg, data: merged, timestamp: new Date().toISOString() });
  }

  trace(msg: string, data?: Record<string, unknown>): void {
    this.record("trace", msg, data);
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.record("debug", msg, data);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.record("info", msg, data);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.record("warn", msg, data);
  }

  error(msg: string, data?: Record<string, unknown>): void {
    this.record("error", msg, data);
  }

  fatal(msg: string, data?: Record<string, unknown>): void {
    this.record("fatal", msg, data);
  }

  /** Children append to the parent's entry list. */
  child(bindings: Record<string, unknown>): BufferLogger {
    return new BufferLogger(this.entries, { ...this.bindings, ...bindings });
  }

  clear(): void {
    this.entries.length = 0;
  }

  getByLevel(level: EmitLevel): readonly LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  has(level: EmitLevel, msgSubstring: string): boolean {
    return this.entries.some((e) => e.level === level && e.msg.includes(msgSubstring));
  }
}
