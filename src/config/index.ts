/**
 * Configuration Module Exports
 *
 * @module config
 */

export {
  // Types
  type ResolvedExtractorConfig,
  // Constants
  ENV_KEYS,
  ExtractorConfigSchema,
  // Functions
  resolveExtractorConfig,
  loadExtractorConfigFromEnv,
  loadLoggerConfigFromEnv,
} from "./extractor-config.js";
