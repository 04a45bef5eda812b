/**
 * Logging Types and Interfaces
 *
 * @module logging/types
 */

/**
 * Log levels supported by the logger
 *
 * Ordered from highest to lowest severity:
 * - silent: Suppress all logging (typically used in tests)
 * - fatal: Application crash, requires immediate attention
 * - error: Error events that might still allow the application to continue
 * - warn: Warning events indicating potential issues
 * - info: Informational messages highlighting progress (default)
 * - debug: Detailed information for debugging
 * - trace: Very detailed information, typically for development only
 */
export type LogLevel = "silent" | "fatal" | "error" | "warn" | "info" | "debug" | "trace";

/**
 * All accepted log level names, in severity order
 */
export const LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const satisfies readonly LogLevel[];

/**
 * Log output format
 * - json: Structured JSON for production/log aggregation
 * - pretty: Human-readable colorized output for development
 */
export type LogFormat = "json" | "pretty";

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default "info"
   */
  level: LogLevel;

  /**
   * Log output format
   * @default "pretty"
   */
  format: LogFormat;

  /**
   * Optional custom output stream
   * When provided, logs are written to this stream as JSON lines instead of stderr
   * @internal - Only used in tests for log capture
   */
  stream?: NodeJS.WritableStream;
}

/**
 * Component context for child loggers
 */
export interface ComponentContext {
  /**
   * Component name (e.g., "documents:document", "engine:mupdf")
   */
  component: string;

  /**
   * Optional request/correlation ID for tracing
   */
  requestId?: string;
}
