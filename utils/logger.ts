export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

let currentLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function isEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel);
}

/**
 * Console logger tagged with a `[scope]` prefix. The level is shared by every
 * logger in the process and is read on each call, so `setLogLevel` after
 * creation still applies.
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug(message, ...details) {
      if (isEnabled("debug")) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (isEnabled("info")) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (isEnabled("warn")) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (isEnabled("error")) console.error(prefix, message, ...details);
    },
  };
}
