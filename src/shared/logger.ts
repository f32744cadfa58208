/**
 * Console logger with a level threshold.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function createLogger(level: LogLevel = "info"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold;

  return {
    debug: (message, ...args) => {
      if (enabled("debug")) console.debug(message, ...args);
    },
    info: (message, ...args) => {
      if (enabled("info")) console.log(message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled("warn")) console.warn(message, ...args);
    },
    error: (message, ...args) => {
      if (enabled("error")) console.error(message, ...args);
    },
  };
}

/** Logger that drops everything; handy for library callers and tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
