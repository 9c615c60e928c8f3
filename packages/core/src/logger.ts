/**
 * Console logging with a scope prefix, filtered by the configured `logLevel`.
 */

import { config, LOG_LEVELS, type LogLevel } from "./config.js";

export interface Logger {
  readonly scope: string;
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

type EmittedLevel = Exclude<LogLevel, "off">;

const SEVERITY: Record<LogLevel, number> = {
  off: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/** True when a message at `level` passes the `threshold`. */
export function isLevelEnabled(level: EmittedLevel, threshold: LogLevel): boolean {
  return SEVERITY[level] <= SEVERITY[threshold];
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a logger whose lines read `[procflow/<scope>] WARN: ...`.
 *
 * The threshold is read from configuration on every call unless `level` is
 * given, so `config.set({ logLevel })` takes effect on existing loggers.
 */
export function createLogger(scope: string, level?: LogLevel): Logger {
  const prefix = `[procflow/${scope}]`;

  const emit = (at: EmittedLevel, message: string, details: unknown[]): void => {
    const threshold = level ?? config.getAll().logLevel;
    if (!isLevelEnabled(at, threshold)) return;

    const line = `${prefix} ${at.toUpperCase()}: ${message}`;
    switch (at) {
      case "error":
        console.error(line, ...details);
        break;
      case "warn":
        console.warn(line, ...details);
        break;
      case "info":
        console.info(line, ...details);
        break;
      case "debug":
        console.debug(line, ...details);
        break;
    }
  };

  return {
    scope,
    error: (message, ...details) => emit("error", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    info: (message, ...details) => emit("info", message, details),
    debug: (message, ...details) => emit("debug", message, details),
  };
}
