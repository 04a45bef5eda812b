/**
 * Logging Module - Public API
 *
 * Structured logging built on Pino with component-based context.
 *
 * ## Quick Start
 *
 * ```typescript
 * // 1. Initialize logger at app startup (once, optional)
 * import { initializeLogger } from './logging/index.js';
 *
 * initializeLogger({ level: 'debug', format: 'pretty' });
 *
 * // 2. Get a component logger in your modules
 * import { getComponentLogger } from './logging/index.js';
 *
 * const logger = getComponentLogger('documents:document');
 * logger.info('Document opened');
 * ```
 *
 * Library modules use `getOptionalComponentLogger`, which stays silent until
 * the application initializes logging.
 *
 * ## Environment Variables
 *
 * - `LOG_LEVEL`: Log level (silent|fatal|error|warn|info|debug|trace) - default: info
 * - `LOG_FORMAT`: Output format (json|pretty) - default: pretty
 *
 * @module logging
 */

export * from "./types.js";

export {
  initializeLogger,
  getComponentLogger,
  getOptionalComponentLogger,
  getRootLogger,
  isLoggerInitialized,
  resetLogger,
} from "./logger-factory.js";
