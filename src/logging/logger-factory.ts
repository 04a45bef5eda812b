/**
 * Logger Factory
 *
 * This module provides the core logging infrastructure using Pino.
 * Handles logger creation, configuration, and component-scoped child loggers.
 *
 * Key features:
 * - Outputs to stderr (stdout is left to the embedding application)
 * - JSON format for production, pretty-print for development
 * - Component-based child loggers with automatic context
 * - Silent fallback so the library can be used without initializing logging
 *
 * @module logging/logger-factory
 */

import pino from "pino";
import type { LoggerConfig, ComponentContext } from "./types.js";

/**
 * Singleton root logger instance
 * Initialized once by the embedding application
 */
let rootLogger: pino.Logger | null = null;

/**
 * Shared silent logger handed out while logging is not initialized
 */
const silentLogger: pino.Logger = pino({ level: "silent" });

/**
 * Base Pino options shared by every output format
 */
function baseOptions(config: LoggerConfig): pino.LoggerOptions {
  return {
    level: config.level,

    // ISO 8601 timestamps for all formats
    timestamp: pino.stdTimeFunctions.isoTime,

    // Format log level as string (not number)
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
}

/**
 * Create the root Pino logger with full configuration
 *
 * @param config - Logger configuration (level, format, optional stream)
 * @returns Configured Pino logger instance
 *
 * @internal
 */
function createRootLogger(config: LoggerConfig): pino.Logger {
  const pinoOptions = baseOptions(config);

  // If custom stream provided (for testing), use it directly
  if (config.stream) {
    return pino(pinoOptions, config.stream);
  }

  if (config.format === "pretty") {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          singleLine: false,
          destination: 2,
        },
      },
    });
  }

  // JSON format (production), file descriptor 2 = stderr
  return pino(pinoOptions, pino.destination(2));
}

/**
 * Initialize the global logger
 *
 * Must be called at most once. Subsequent calls will throw an error.
 *
 * @param config - Logger configuration
 * @throws Error if logger is already initialized
 *
 * @example
 * ```typescript
 * import { initializeLogger, loadLoggerConfigFromEnv } from "folio-extract";
 *
 * initializeLogger(loadLoggerConfigFromEnv());
 * ```
 */
export function initializeLogger(config: LoggerConfig): void {
  if (rootLogger !== null) {
    throw new Error("Logger already initialized. initializeLogger() should only be called once.");
  }

  try {
    rootLogger = createRootLogger(config);

    rootLogger.debug({ config: { level: config.level, format: config.format } }, "Logger initialized");
  } catch (error) {
    // pino-pretty may be missing in production installs; keep JSON on stderr
    rootLogger = pino(baseOptions(config), pino.destination(2));

    rootLogger.warn(
      {
        requestedFormat: config.format,
        fallbackFormat: "json",
        error: error instanceof Error ? error.message : String(error),
      },
      "Logger initialization failed, using fallback JSON logger"
    );
  }
}

/**
 * Get the root logger instance
 *
 * @returns Root logger instance
 * @throws Error if logger not initialized
 *
 * @internal - Most code should use getComponentLogger() instead
 */
export function getRootLogger(): pino.Logger {
  if (rootLogger === null) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return rootLogger;
}

/**
 * Check whether initializeLogger() has been called
 */
export function isLoggerInitialized(): boolean {
  return rootLogger !== null;
}

/**
 * Get a component-scoped logger
 *
 * Creates a child logger with automatic component context.
 *
 * @param component - Component name (use colon notation for hierarchy)
 * @param requestId - Optional request/correlation ID for tracing
 * @returns Child logger with component context
 * @throws Error if logger not initialized
 *
 * @example
 * ```typescript
 * const logger = getComponentLogger("documents:document");
 * logger.debug({ pageCount: 12 }, "Document opened");
 * // Output: {"level":"debug","component":"documents:document","pageCount":12,...}
 * ```
 */
export function getComponentLogger(component: string, requestId?: string): pino.Logger {
  const root = getRootLogger();

  const context: ComponentContext = {
    component,
    ...(requestId && { requestId }),
  };

  return root.child(context);
}

/**
 * Get a component-scoped logger, or a silent one when logging is not initialized
 *
 * Library code calls this on every use instead of caching the result, so that
 * an application initializing the logger after import still receives the logs.
 *
 * @param component - Component name (use colon notation for hierarchy)
 */
export function getOptionalComponentLogger(component: string): pino.Logger {
  if (rootLogger === null) {
    return silentLogger;
  }
  return getComponentLogger(component);
}

/**
 * Reset logger (for testing only)
 *
 * Clears the singleton root logger to allow re-initialization.
 *
 * @internal
 */
export function resetLogger(): void {
  rootLogger = null;
}
