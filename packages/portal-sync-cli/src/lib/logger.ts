// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

/** Receives each formatted line; the default routes to stdout/stderr. */
export type LogSink = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Override output destination (progress UI, tests) */
  sink?: LogSink;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(defaultMeta: Record<string, unknown>): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Metadata keys whose values never reach the output */
const REDACTED_KEYS = new Set(["password", "secret", "clientSecret", "token", "accessToken"]);

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Writes info/debug to stdout and warn/error to stderr.
 */
export const consoleSink: LogSink = (line, level) => {
  if (level === "warn" || level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
};

function redact(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    result[key] = REDACTED_KEYS.has(key) && value !== undefined ? "[redacted]" : value;
  }
  return result;
}

/**
 * Create a structured logger.
 * Every transfer worker logs through a child carrying its item metadata,
 * so concurrent lines stay attributable in both text and JSON output.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];
  const sink = options.sink ?? consoleSink;

  function formatMessage(
    level: LogLevel,
    message: string,
    meta: Record<string, unknown>
  ): string {
    const timestamp = new Date().toISOString();

    if (options.json) {
      const entry: LogEntry = {
        timestamp,
        level,
        message,
        ...meta,
      };
      return JSON.stringify(entry);
    }

    const prefix = `[${timestamp}] ${level.toUpperCase().padEnd(5)}`;
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${prefix} ${message}${metaStr}`;
  }

  function log(
    level: LogLevel,
    message: string,
    meta: Record<string, unknown> = {},
    defaultMeta: Record<string, unknown> = {}
  ): void {
    if (LOG_LEVELS[level] < minLevel) return;

    const combinedMeta = redact({ ...defaultMeta, ...meta });
    sink(formatMessage(level, message, combinedMeta), level);
  }

  function createLoggerInstance(
    defaultMeta: Record<string, unknown> = {}
  ): Logger {
    return {
      debug: (msg, meta) => log("debug", msg, meta, defaultMeta),
      info: (msg, meta) => log("info", msg, meta, defaultMeta),
      warn: (msg, meta) => log("warn", msg, meta, defaultMeta),
      error: (msg, meta) => log("error", msg, meta, defaultMeta),
      child: (childMeta) =>
        createLoggerInstance({ ...defaultMeta, ...childMeta }),
    };
  }

  return createLoggerInstance();
}

/**
 * Create a no-op logger that discards all messages.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
