// ============================================
// Structured Logger
// ============================================

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVEL_MAP[value?.trim().toUpperCase() ?? ""];
}

export interface LoggerOptions {
  level?: LogLevel;
  now?: () => Date;
}

export type LogMeta = Record<string, unknown>;

/**
 * One JSON line per entry; WARN goes to stderr via console.warn, ERROR via console.error.
 * The level is read from LOG_LEVEL on each call unless pinned in options.
 */
export function createLogger(service: string, options: LoggerOptions = {}) {
  const now = options.now ?? (() => new Date());

  function log(level: LogLevel, message: string, meta?: LogMeta) {
    const minLevel = options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;
    if (level < minLevel) return;

    const entry = {
      timestamp: now().toISOString(),
      level: LOG_LEVEL_NAMES[level],
      service,
      message,
      ...meta,
    };

    const output = JSON.stringify(entry);

    if (level >= LogLevel.ERROR) {
      console.error(output);
    } else if (level >= LogLevel.WARN) {
      console.warn(output);
    } else {
      console.log(output);
    }
  }

  return {
    debug: (msg: string, meta?: LogMeta) => log(LogLevel.DEBUG, msg, meta),
    info: (msg: string, meta?: LogMeta) => log(LogLevel.INFO, msg, meta),
    warn: (msg: string, meta?: LogMeta) => log(LogLevel.WARN, msg, meta),
    error: (msg: string, meta?: LogMeta) => log(LogLevel.ERROR, msg, meta),
  };
}

export type Logger = ReturnType<typeof createLogger>;
