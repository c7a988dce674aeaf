import process from "node:process";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * `json` writes one object per line for machines (the MCP server, log shippers); `text` writes
 * `time LEVEL scope: message key=value` for a person watching a terminal.
 */
export type LogFormat = "json" | "text";

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  scope: string;
  message: string;
  context?: LogContext;
}

export interface Logger {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  child: (scope: string, context?: LogContext) => Logger;
}

export interface CreateLoggerOptions {
  scope?: string;
  level?: LogLevel;
  format?: LogFormat;
  context?: LogContext;
  stream?: NodeJS.WritableStream;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export const isLogLevel = (value: string): value is LogLevel => {
  return LOG_LEVELS.some((level) => level === value);
};

/** Errors do not survive JSON.stringify, so they are flattened first. */
const toLoggable = (value: unknown): unknown => {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  return value;
};

const normalizeContext = (context: LogContext): LogContext | undefined => {
  const entries = Object.entries(context);
  if (entries.length === 0) {
    return undefined;
  }

  return Object.fromEntries(entries.map(([key, value]) => [key, toLoggable(value)]));
};

const formatTextValue = (value: unknown): string => {
  if (typeof value === "string") {
    return /[\s"=]/.test(value) || value.length === 0 ? JSON.stringify(value) : value;
  }

  if (typeof value === "object" && value !== null) {
    return JSON.stringify(value);
  }

  return String(value);
};

export const formatLogEntry = (entry: LogEntry, format: LogFormat): string => {
  if (format === "json") {
    return JSON.stringify(entry);
  }

  const time = entry.timestamp.slice(11, 23);
  const pairs = Object.entries(entry.context ?? {}).map(([key, value]) => `${key}=${formatTextValue(value)}`);
  return [`${time} ${entry.level.toUpperCase().padEnd(5)} ${entry.scope}: ${entry.message}`, ...pairs].join(" ");
};

export const createLogger = (options: CreateLoggerOptions = {}): Logger => {
  const scope = options.scope ?? "salvo";
  const level = options.level ?? "info";
  const format = options.format ?? "json";
  const stream = options.stream ?? process.stderr;
  const baseContext = options.context ?? {};

  const emit = (entryLevel: LogLevel, message: string, context: LogContext = {}): void => {
    if (LEVEL_RANK[entryLevel] < LEVEL_RANK[level]) {
      return;
    }

    const merged = normalizeContext({ ...baseContext, ...context });
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: entryLevel,
      scope,
      message,
      ...(merged === undefined ? {} : { context: merged })
    };
    stream.write(`${formatLogEntry(entry, format)}\n`);
  };

  return {
    debug: (message, context) => emit("debug", message, context),
    info: (message, context) => emit("info", message, context),
    warn: (message, context) => emit("warn", message, context),
    error: (message, context) => emit("error", message, context),
    child: (childScope, childContext) =>
      createLogger({
        scope: `${scope}:${childScope}`,
        level,
        format,
        context: { ...baseContext, ...(childContext ?? {}) },
        stream
      })
  };
};
