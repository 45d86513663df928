/**
 * Structured logger with support for log levels and JSON/text output.
 *
 * Configuration via environment variables:
 * - LOG_LEVEL: "debug" | "info" | "warn" | "error" (default: "info")
 * - LOG_FORMAT: "json" | "text" (default: "text")
 *
 * All output goes to stderr so stdout stays free for command output and the
 * MCP stdio transport.
 *
 * @example
 * ```ts
 * import { logger } from "@ticklist/shared/logger";
 *
 * logger.info("Imported todos", { count: 12 });
 * logger.error("Rollback failed", { error });
 *
 * // Child logger with preset context
 * const log = logger.child({ service: "TodoManager" });
 * log.info("Created todo", { priority: 1 });
 * ```
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = {
  [key: string]: unknown;
};

type LogEntry = {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
};

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return "info";
}

function getLogFormat(): "json" | "text" {
  const format = process.env.LOG_FORMAT?.toLowerCase();
  if (format === "json") {
    return "json";
  }
  return "text";
}

function shouldLog(level: LogLevel): boolean {
  const currentLevel = getLogLevel();
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

// Errors stringify to "{}", so flatten them to name and message.
function normalizeContext(context: LogContext): LogContext {
  const normalized: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    normalized[key] =
      value instanceof Error
        ? { name: value.name, message: value.message }
        : typeof value === "bigint"
          ? value.toString()
          : value;
  }
  return normalized;
}

function formatText(entry: LogEntry): string {
  const levelColors: Record<LogLevel, string> = {
    debug: "\x1b[90m", // gray
    info: "\x1b[36m", // cyan
    warn: "\x1b[33m", // yellow
    error: "\x1b[31m", // red
  };
  const reset = "\x1b[0m";
  const color = levelColors[entry.level];
  const levelStr = entry.level.toUpperCase().padEnd(5);

  let msg = `${color}[${levelStr}]${reset} ${entry.message}`;

  if (entry.context) {
    const contextStr = Object.entries(entry.context)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(" ");
    msg += ` ${color}${contextStr}${reset}`;
  }

  return msg;
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

function log(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...(context && Object.keys(context).length > 0
      ? { context: normalizeContext(context) }
      : {}),
  };

  const format = getLogFormat();
  const output = format === "json" ? formatJson(entry) : formatText(entry);

  console.error(output);
}

export type Logger = {
  debug: (message: string, context?: LogContext) => void;
  info: (message: string, context?: LogContext) => void;
  warn: (message: string, context?: LogContext) => void;
  error: (message: string, context?: LogContext) => void;
  /**
   * Create a child logger with preset context fields. Children can be
   * nested; inner fields win over outer ones.
   */
  child: (baseContext: LogContext) => Logger;
};

function createLogger(baseContext: LogContext): Logger {
  const merge = (context?: LogContext) => ({ ...baseContext, ...context });

  return {
    debug: (message, context) => log("debug", message, merge(context)),
    info: (message, context) => log("info", message, merge(context)),
    warn: (message, context) => log("warn", message, merge(context)),
    error: (message, context) => log("error", message, merge(context)),
    child: (childContext) => createLogger(merge(childContext)),
  };
}

export const logger: Logger = createLogger({});
