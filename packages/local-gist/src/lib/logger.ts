import chalk from "chalk";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Line sink; defaults to stderr so stdout only carries command output */
  write?: (line: string) => void;
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

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger.
 *
 * Every line goes to stderr: `list --json` and friends print their payload on
 * stdout, and log lines must never be mixed into it.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];
  const write = options.write ?? ((line: string) => process.stderr.write(`${line}\n`));

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

    const label = LEVEL_COLORS[level](level.toUpperCase().padEnd(5));
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${chalk.dim(JSON.stringify(meta))}` : "";
    return `${chalk.dim(`[${timestamp}]`)} ${label} ${message}${metaStr}`;
  }

  function createLoggerInstance(defaultMeta: Record<string, unknown>): Logger {
    const log = (level: LogLevel, message: string, meta: Record<string, unknown> = {}) => {
      if (LOG_LEVELS[level] < minLevel) return;
      write(formatMessage(level, message, { ...defaultMeta, ...meta }));
    };

    return {
      debug: (msg, meta) => log("debug", msg, meta),
      info: (msg, meta) => log("info", msg, meta),
      warn: (msg, meta) => log("warn", msg, meta),
      error: (msg, meta) => log("error", msg, meta),
      child: (childMeta) =>
        createLoggerInstance({ ...defaultMeta, ...childMeta }),
    };
  }

  return createLoggerInstance({});
}

/**
 * Create a no-op logger that discards all messages.
 * Library callers get this when they pass no logger of their own.
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
