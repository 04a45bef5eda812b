/**
 * Metadata lookup.
 *
 * @module documents/extractors/MetadataReader
 */

import type { NativeDocument } from "../../engine/types.js";
import { METADATA_LOOKUP_KEYS, type MetadataKey } from "../constants.js";
import { toError } from "../errors.js";
import type { MetadataRecord } from "../types.js";
import { getOptionalComponentLogger } from "../../logging/index.js";

/**
 * Cut a string to at most `maxBytes` UTF-8 bytes without splitting a character.
 *
 * @example
 * ```typescript
 * truncateToByteLength("héllo", 2); // "h"
 * ```
 */
export function truncateToByteLength(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, "utf8") <= maxBytes) {
    return value;
  }

  let bytes = 0;
  let end = 0;
  for (const char of value) {
    const size = Buffer.byteLength(char, "utf8");
    if (bytes + size > maxBytes) {
      break;
    }
    bytes += size;
    end += char.length;
  }
  return value.slice(0, end);
}

/**
 * Strip trailing NUL padding.
 */
export function trimTrailingNul(value: string): string {
  return value.replace(/\0+$/, "");
}

/**
 * Look up one metadata field through a bounded buffer.
 *
 * The value keeps at most `bufferBytes - 1` bytes, the last byte being
 * reserved for the terminator. Absent fields and failed lookups yield "".
 */
function lookupBounded(native: NativeDocument, key: MetadataKey, bufferBytes: number): string {
  const engineKey = METADATA_LOOKUP_KEYS[key];
  let value: string | undefined;
  try {
    value = native.lookupMetadata(engineKey);
  } catch (error) {
    getOptionalComponentLogger("documents:metadata").warn(
      { key: engineKey, error: toError(error).message },
      "Metadata lookup failed, reporting field as empty"
    );
    return "";
  }
  if (value === undefined) {
    return "";
  }
  return trimTrailingNul(truncateToByteLength(value, bufferBytes - 1));
}

/**
 * Read the fixed set of metadata fields.
 *
 * Never fails: every key is present, unavailable fields are empty strings.
 * Callers must hold the document's access lock.
 *
 * @param native - Open engine document
 * @param bufferBytes - Lookup buffer size including the terminator
 */
export function readMetadata(native: NativeDocument, bufferBytes: number): MetadataRecord {
  const lookup = (key: MetadataKey): string => lookupBounded(native, key, bufferBytes);

  return {
    format: lookup("format"),
    encryption: lookup("encryption"),
    title: lookup("title"),
    author: lookup("author"),
    subject: lookup("subject"),
    keywords: lookup("keywords"),
    creator: lookup("creator"),
    producer: lookup("producer"),
    creationDate: lookup("creationDate"),
    modDate: lookup("modDate"),
  };
}
