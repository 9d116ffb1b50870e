/**
 * Micro-logger — level-filtered console output with JSON meta
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVEL_ENV, LOG_LEVELS } from "@/constants";

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Resolve the active level from a raw environment value.
 * Unknown or missing values fall back to DEFAULT_LOG_LEVEL.
 */
export function resolveLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value && isLogLevel(value)) {
    return value;
  }
  return DEFAULT_LOG_LEVEL;
}

const currentLevelValue = LOG_LEVELS[resolveLogLevel(process.env[LOG_LEVEL_ENV])];

/**
 * Render a log line: "[timestamp] [LEVEL] message {meta}"
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  meta: LogMeta | undefined,
  timestamp: string,
): string {
  const renderedMeta =
    meta && Object.keys(meta).length > 0 ? " " + JSON.stringify(meta) : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${renderedMeta}`;
}

function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }
  const line = formatLogLine(level, message, meta, new Date().toISOString());

  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function debug(message: string, meta?: LogMeta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: LogMeta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: LogMeta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: LogMeta): void {
  log("error", message, meta);
}

/** Module logger as a Logger value, for dependency defaults */
export const defaultLogger: Logger = { debug, info, warn, error };

/**
 * Create a logger whose calls carry `context` merged under their own meta
 */
export function withContext(context: LogMeta, base: Logger = defaultLogger): Logger {
  return {
    debug: (message, meta) => base.debug(message, { ...context, ...meta }),
    info: (message, meta) => base.info(message, { ...context, ...meta }),
    warn: (message, meta) => base.warn(message, { ...context, ...meta }),
    error: (message, meta) => base.error(message, { ...context, ...meta }),
  };
}
