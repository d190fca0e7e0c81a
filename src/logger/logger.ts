/**
 * Micro-logger wrapper: minimal logging with level filtering
 * No external dependencies, wraps console.error so stdout stays reserved
 * for link output.
 */

import type { LogLevel, LogMeta, Logger } from "@/types";
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from "@/constants";

/**
 * Narrow an arbitrary string to a known log level
 */
export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// Read from environment, default to 'info'
const envLevel = process.env.LOG_LEVEL?.toLowerCase();
let currentLevelValue = LOG_LEVELS[isLogLevel(envLevel) ? envLevel : DEFAULT_LOG_LEVEL];

/**
 * Override the threshold at runtime (after configuration is loaded)
 */
export function setLevel(level: LogLevel): void {
  currentLevelValue = LOG_LEVELS[level];
}

/**
 * Format meta object as JSON string
 */
function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return "";
  }
  return " " + JSON.stringify(meta);
}

/**
 * Log message if level is enabled
 */
function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }
  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level.toUpperCase()}] ${message}${formatMeta(meta)}`;

  switch (level) {
    case "debug":
    case "info":
    case "error":
      console.error(logMessage);
      break;
    case "warn":
      console.warn(logMessage);
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

/**
 * Create a logger with bound context (meta merged into all calls)
 */
export function withContext(context: LogMeta): Logger {
  return {
    debug: (message: string, meta?: LogMeta) => debug(message, { ...context, ...meta }),
    info: (message: string, meta?: LogMeta) => info(message, { ...context, ...meta }),
    warn: (message: string, meta?: LogMeta) => warn(message, { ...context, ...meta }),
    error: (message: string, meta?: LogMeta) => error(message, { ...context, ...meta }),
  };
}

/**
 * Render an unknown thrown value for log meta
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
