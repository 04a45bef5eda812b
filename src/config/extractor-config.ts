/**
 * Extractor Configuration Module
 *
 * Defines the validated configuration used by documents and loads it from
 * explicit overrides or environment variables.
 *
 * @module config/extractor-config
 */

import { z } from "zod";
import {
  DEFAULT_EXTRACTOR_CONFIG,
  MAX_METADATA_BUFFER_BYTES,
  MAX_OUTLINE_DEPTH_LIMIT,
  MIN_METADATA_BUFFER_BYTES,
} from "../documents/constants.js";
import type { ExtractorConfig } from "../documents/types.js";
import { LOG_LEVELS, type LoggerConfig } from "../logging/types.js";

/**
 * Zod schema for a fully resolved extractor configuration
 */
export const ExtractorConfigSchema = z.object({
  maxFileSizeBytes: z.number().int().positive(),
  metadataBufferBytes: z
    .number()
    .int()
    .min(MIN_METADATA_BUFFER_BYTES)
    .max(MAX_METADATA_BUFFER_BYTES),
  maxOutlineDepth: z.number().int().min(1).max(MAX_OUTLINE_DEPTH_LIMIT),
});

/**
 * Extractor configuration with every field present and validated
 */
export type ResolvedExtractorConfig = z.infer<typeof ExtractorConfigSchema>;

/**
 * Zod schema for log level names
 */
const LogLevelSchema = z.enum(LOG_LEVELS);

/**
 * Zod schema for log output formats
 */
const LogFormatSchema = z.enum(["json", "pretty"]);

/**
 * Environment variable names read by the loaders below
 */
export const ENV_KEYS = {
  MAX_FILE_SIZE_BYTES: "EXTRACTOR_MAX_FILE_SIZE_BYTES",
  METADATA_BUFFER_BYTES: "EXTRACTOR_METADATA_BUFFER_BYTES",
  MAX_OUTLINE_DEPTH: "EXTRACTOR_MAX_OUTLINE_DEPTH",
  LOG_LEVEL: "LOG_LEVEL",
  LOG_FORMAT: "LOG_FORMAT",
} as const;

/**
 * Parse an integer environment variable
 */
function parseEnvInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    return undefined;
  }
  return parsed;
}

/**
 * Merge overrides onto the defaults and validate the result
 *
 * @param overrides - Partial configuration; missing fields take their defaults
 * @returns Validated configuration
 * @throws Error listing every invalid field
 *
 * @example
 * ```typescript
 * const config = resolveExtractorConfig({ maxOutlineDepth: 32 });
 * config.metadataBufferBytes; // 256
 * ```
 */
export function resolveExtractorConfig(overrides?: ExtractorConfig): ResolvedExtractorConfig {
  const candidate = {
    maxFileSizeBytes: overrides?.maxFileSizeBytes ?? DEFAULT_EXTRACTOR_CONFIG.maxFileSizeBytes,
    metadataBufferBytes:
      overrides?.metadataBufferBytes ?? DEFAULT_EXTRACTOR_CONFIG.metadataBufferBytes,
    maxOutlineDepth: overrides?.maxOutlineDepth ?? DEFAULT_EXTRACTOR_CONFIG.maxOutlineDepth,
  };

  const result = ExtractorConfigSchema.safeParse(candidate);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid extractor configuration: ${issues}`);
  }

  return result.data;
}

/**
 * Load extractor configuration from environment variables
 *
 * Environment variables:
 * - EXTRACTOR_MAX_FILE_SIZE_BYTES: Largest file `Document.open` reads (default: 52428800)
 * - EXTRACTOR_METADATA_BUFFER_BYTES: Metadata lookup buffer, NUL included (default: 256)
 * - EXTRACTOR_MAX_OUTLINE_DEPTH: Deepest outline level emitted (default: 256)
 *
 * Unparsable values fall back to defaults; out-of-range values are rejected.
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns Validated configuration
 * @throws Error if a value is out of range
 */
export function loadExtractorConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): ResolvedExtractorConfig {
  return resolveExtractorConfig({
    maxFileSizeBytes: parseEnvInt(env[ENV_KEYS.MAX_FILE_SIZE_BYTES]),
    metadataBufferBytes: parseEnvInt(env[ENV_KEYS.METADATA_BUFFER_BYTES]),
    maxOutlineDepth: parseEnvInt(env[ENV_KEYS.MAX_OUTLINE_DEPTH]),
  });
}

/**
 * Load logger configuration from environment variables
 *
 * Environment variables:
 * - LOG_LEVEL: one of silent|fatal|error|warn|info|debug|trace (default: info)
 * - LOG_FORMAT: json|pretty (default: pretty)
 *
 * Unknown values fall back to the defaults.
 *
 * @param env - Environment to read (defaults to process.env)
 */
export function loadLoggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const level = LogLevelSchema.safeParse(env[ENV_KEYS.LOG_LEVEL]?.trim().toLowerCase());
  const format = LogFormatSchema.safeParse(env[ENV_KEYS.LOG_FORMAT]?.trim().toLowerCase());

  return {
    level: level.success ? level.data : "info",
    format: format.success ? format.data : "pretty",
  };
}
