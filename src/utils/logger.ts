/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

let currentLogLevel: LogLevel = LogLevel.INFO; // Default level

/**
 * Sets the current logging level for the application.
 * @param level - The desired log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

/**
 * Returns the log level currently in effect.
 */
export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Maps a level name such as the value of `LOG_LEVEL` to a {@link LogLevel}.
 * Unknown or missing names yield `undefined` so callers keep their default.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  switch (name?.trim().toLowerCase()) {
    case "error":
      return LogLevel.ERROR;
    case "warn":
    case "warning":
      return LogLevel.WARN;
    case "info":
      return LogLevel.INFO;
    case "debug":
      return LogLevel.DEBUG;
    default:
      return undefined;
  }
}

/**
 * Provides logging functionalities with level control.
 */
export const logger = {
  /**
   * Logs a debug message if the current log level is DEBUG or higher.
   */
  debug: (message: string) => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      console.debug(message);
    }
  },
  /**
   * Logs an info message if the current log level is INFO or higher.
   */
  info: (message: string) => {
    if (currentLogLevel >= LogLevel.INFO) {
      console.log(message); // Using console.log for INFO
    }
  },
  /**
   * Logs a warning message if the current log level is WARN or higher.
   */
  warn: (message: string) => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  /**
   * Logs an error message. Errors are never filtered out.
   */
  error: (message: string) => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};
