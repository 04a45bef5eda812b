/**
 * Document extraction module.
 *
 * Opens PDF and EPUB documents through a parsing engine and extracts page
 * text, embedded images, the outline and standard metadata.
 *
 * @module documents
 *
 * @example
 * ```typescript
 * import { Document, isNotImageError } from "./documents";
 *
 * const document = await Document.open("/path/to/doc.pdf");
 * try {
 *   console.log(await document.extractText(0));
 *   for (const image of await document.scanImages()) {
 *     console.log(image.objectNumber, image.bytes.byteLength);
 *   }
 * } finally {
 *   await document.close();
 * }
 * ```
 */

// Type exports
export type {
  DocumentFormat,
  OutlineEntry,
  MetadataRecord,
  DecodedImage,
  ExtractedImage,
  PageText,
  ExtractorConfig,
  OpenOptions,
  ByteSource,
} from "./types.js";

// Constants
export {
  PDF_MIME_TYPE,
  EPUB_MIME_TYPE,
  DOCUMENT_EXTENSIONS,
  SUPPORTED_EXTENSIONS,
  MIME_TYPES,
  MAGIC_BYTES,
  METADATA_LOOKUP_KEYS,
  DEFAULT_EXTRACTOR_CONFIG,
} from "./constants.js";
export type { MetadataKey } from "./constants.js";

// Error classes
export {
  DocumentError,
  NoSuchFileError,
  FileAccessError,
  FileTooLargeError,
  CreateContextError,
  OpenDocumentError,
  OpenMemoryError,
  NeedsPasswordError,
  PageMissingError,
  ObjectMissingError,
  NotImageError,
  LoadOutlineError,
  DocumentClosedError,
  ExtractionError,
  isDocumentError,
  isNotImageError,
} from "./errors.js";
export type { DocumentErrorOptions, DocumentErrorCode } from "./errors.js";

// Extractors
export { decodePng, flattenOutline } from "./extractors/index.js";
export type { FlattenedOutline } from "./extractors/index.js";

// Format detection
export { DocumentTypeDetector, detectFormat } from "./DocumentTypeDetector.js";

// Document handle
export { Document } from "./Document.js";
