/**
 * Telemetry Type Definitions
 *
 * @module telemetry/types
 */

/**
 * Log levels supported by the logging system
 */
export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR" | "SILENT";

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level?: LogLevel;
}
