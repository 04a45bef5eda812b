/**
 * Type definitions for document extraction.
 *
 * @module documents/types
 */

import type { MetadataKey } from "./constants.js";
import type { ParsingEngine } from "../engine/types.js";

/**
 * Format detected from a document's leading bytes.
 *
 * The empty string means the content matched no known signature.
 */
export type DocumentFormat = "application/pdf" | "application/epub+zip" | "";

/**
 * One table-of-contents entry, flattened from the outline tree.
 *
 * @example
 * ```typescript
 * const entry: OutlineEntry = {
 *   level: 2,
 *   title: "1.1 Scope",
 *   destinationURI: "#page=3&zoom=nan,0,700",
 *   targetPage: 2,
 *   verticalOffset: 92
 * };
 * ```
 */
export interface OutlineEntry {
  /**
   * Depth in the outline tree; 1 for top-level entries.
   */
  level: number;

  /**
   * Entry title, possibly empty.
   */
  title: string;

  /**
   * Link target as reported by the engine, possibly empty.
   */
  destinationURI: string;

  /**
   * 0-based page index of an internal link, -1 when the link leaves the document.
   */
  targetPage: number;

  /**
   * Y coordinate on the target page used for scroll positioning.
   */
  verticalOffset: number;
}

/**
 * Metadata fields read from the document's information dictionary.
 *
 * Every key is always present; unavailable fields are empty strings.
 */
export type MetadataRecord = Record<MetadataKey, string>;

/**
 * Decoded raster image with RGBA pixels, row-major, 8 bits per channel.
 */
export interface DecodedImage {
  width: number;
  height: number;
  /**
   * Always 4: pixels are expanded to RGBA on decode.
   */
  channels: 4;
  data: Uint8Array;
}

/**
 * A PNG-encoded image found while scanning a document's objects.
 */
export interface ExtractedImage {
  /**
   * Indirect object number the image was decoded from.
   */
  objectNumber: number;

  /**
   * PNG-encoded image bytes.
   */
  bytes: Uint8Array;
}

/**
 * Text of one page.
 */
export interface PageText {
  /**
   * 0-based page index.
   */
  pageIndex: number;

  text: string;
}

/**
 * Configuration options for documents.
 *
 * @example
 * ```typescript
 * const config: ExtractorConfig = {
 *   maxFileSizeBytes: 10_485_760, // 10MB
 *   maxOutlineDepth: 32
 * };
 * ```
 */
export interface ExtractorConfig {
  /**
   * Maximum file size in bytes accepted by `Document.open`.
   *
   * Files exceeding this size are rejected with FileTooLargeError.
   *
   * @default 52428800 (50MB)
   */
  maxFileSizeBytes?: number;

  /**
   * Size of the bounded metadata lookup, including the terminating NUL.
   *
   * Values longer than `metadataBufferBytes - 1` UTF-8 bytes are truncated.
   *
   * @default 256
   */
  metadataBufferBytes?: number;

  /**
   * Deepest outline level returned by `loadOutline`; deeper entries are dropped.
   *
   * @default 256
   */
  maxOutlineDepth?: number;
}

/**
 * Options accepted by the `Document` factories.
 */
export interface OpenOptions {
  /**
   * Engine used to parse the document.
   *
   * @default the shared MuPDF engine
   */
  engine?: ParsingEngine;

  /**
   * Configuration overrides.
   */
  config?: ExtractorConfig;
}

/**
 * Byte sources accepted by `Document.openFromStream`.
 *
 * Node.js readable streams are async iterables and qualify directly.
 */
export type ByteSource = AsyncIterable<Uint8Array | string>;
