/**
 * Prefixed, levelled console logger.
 *
 * Level comes from LOG_LEVEL (debug | info | warn | error, default info) and
 * can be changed at runtime with setLogLevel().
 *
 * Output format:
 *   [ISO_TIMESTAMP] LEVEL [PREFIX] message key=value key=value
 *
 * @example
 * const log = createLogger("FACTORY");
 * log.info("Loaded catalog", { models: 3 });
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

function levelFromEnv(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return envLevel !== undefined && envLevel in LOG_LEVEL_MAP
    ? LOG_LEVEL_MAP[envLevel]
    : LogLevel.INFO;
}

let currentLogLevel = levelFromEnv();

export function formatContext(context?: LogContext): string {
  if (!context) return "";
  const entries = Object.entries(context);
  if (entries.length === 0) return "";

  const formatted = entries
    .map(([key, value]) => {
      if (value === undefined || value === null) return `${key}=null`;
      if (value instanceof Error) return `${key}=${value.message}`;
      if (typeof value === "object") return `${key}=${JSON.stringify(value)}`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
  return ` ${formatted}`;
}

function write(
  level: LogLevel,
  levelName: string,
  prefix: string,
  message: string,
  context?: LogContext,
): void {
  if (level < currentLogLevel) return;

  const line = `[${new Date().toISOString()}] ${levelName} [${prefix}] ${message}${formatContext(context)}`;
  if (level >= LogLevel.ERROR) {
    console.error(line);
  } else if (level === LogLevel.WARN) {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(prefix: string): Logger {
  return {
    debug: (message, context) => write(LogLevel.DEBUG, "DEBUG", prefix, message, context),
    info: (message, context) => write(LogLevel.INFO, "INFO ", prefix, message, context),
    warn: (message, context) => write(LogLevel.WARN, "WARN ", prefix, message, context),
    error: (message, context) => write(LogLevel.ERROR, "ERROR", prefix, message, context),
  };
}

export function setLogLevel(level: LogLevel | string): void {
  if (typeof level !== "string") {
    currentLogLevel = level;
    return;
  }
  const parsed = LOG_LEVEL_MAP[level.toLowerCase()];
  if (parsed !== undefined) {
    currentLogLevel = parsed;
  }
}

export function getLogLevel(): string {
  const match = Object.entries(LOG_LEVEL_MAP).find(([, v]) => v === currentLogLevel);
  return match ? match[0] : "info";
}
