/**
 * Logger Module
 *
 * Named loggers backed by loglevel. Every logger handed out by
 * `getLogger` follows the level set through `setupLogger`.
 *
 * @module telemetry/logger
 */

import log from "loglevel";
import type { LoggerConfig, LogLevel } from "./types.ts";

export const DEFAULT_LOG_LEVEL: LogLevel = "WARN";

const loggers = new Map<string, log.Logger>();
let currentLevel: LogLevel = DEFAULT_LOG_LEVEL;

/**
 * Get a named logger (created on first use)
 */
export function getLogger(name: string = "default"): log.Logger {
  let logger = loggers.get(name);
  if (!logger) {
    logger = log.getLogger(name);
    logger.setLevel(currentLevel, false);
    loggers.set(name, logger);
  }
  return logger;
}

/**
 * Apply a logger configuration to the root logger and every named logger
 */
export function setupLogger(config: LoggerConfig = {}): void {
  currentLevel = config.level ?? DEFAULT_LOG_LEVEL;
  log.setLevel(currentLevel, false);
  for (const logger of loggers.values()) {
    logger.setLevel(currentLevel, false);
  }
}

/**
 * Current level applied by `setupLogger`
 */
export function getLogLevel(): LogLevel {
  return currentLevel;
}
