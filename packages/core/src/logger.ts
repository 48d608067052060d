import { getResolverConstants, LOG_LEVELS, type LogLevel } from "./constants";

export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

type LogMethod = Exclude<LogLevel, "silent">;

const rank = (level: LogLevel): number => LOG_LEVELS.indexOf(level);

/**
 * Console-backed logger. The threshold is read from the resolver constants on
 * every call unless one is pinned here.
 */
export const createConsoleLogger = (
  scope: string,
  level?: LogLevel
): Logger => {
  const write = (
    method: LogMethod,
    message: string,
    details?: Record<string, unknown>
  ) => {
    const threshold = level ?? getResolverConstants().logLevel;
    if (rank(method) < rank(threshold)) {
      return;
    }
    const line = `[${scope}] ${message}`;
    if (details) {
      console[method](line, details);
    } else {
      console[method](line);
    }
  };

  return {
    debug: (message, details) => write("debug", message, details),
    info: (message, details) => write("info", message, details),
    warn: (message, details) => write("warn", message, details),
    error: (message, details) => write("error", message, details),
  };
};

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
