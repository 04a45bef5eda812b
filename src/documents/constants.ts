/**
 * Constants for document processing.
 *
 * Defines supported extensions, MIME types, magic bytes, metadata lookup keys
 * and default configuration values.
 *
 * @module documents/constants
 */

/**
 * MIME type reported for PDF documents.
 */
export const PDF_MIME_TYPE = "application/pdf";

/**
 * MIME type reported for EPUB documents.
 */
export const EPUB_MIME_TYPE = "application/epub+zip";

/**
 * Supported document extensions grouped by type.
 *
 * @example
 * ```typescript
 * if (DOCUMENT_EXTENSIONS.epub.includes(extension)) {
 *   // Handle EPUB
 * }
 * ```
 */
export const DOCUMENT_EXTENSIONS = {
  pdf: [".pdf"],
  epub: [".epub"],
} as const;

/**
 * All supported extensions combined.
 */
export const SUPPORTED_EXTENSIONS = [...DOCUMENT_EXTENSIONS.pdf, ...DOCUMENT_EXTENSIONS.epub] as const;

/**
 * MIME type mappings for supported file extensions.
 *
 * @example
 * ```typescript
 * const mimeType = MIME_TYPES[".pdf"]; // "application/pdf"
 * ```
 */
export const MIME_TYPES: Readonly<Record<string, string>> = {
  ".pdf": PDF_MIME_TYPE,
  ".epub": EPUB_MIME_TYPE,
};

/**
 * Byte signatures used by content sniffing.
 */
export const MAGIC_BYTES = {
  /** `%PDF` */
  pdf: [0x25, 0x50, 0x44, 0x46],
  /** ZIP local file header `PK\x03\x04` */
  zipLocalFileHeader: [0x50, 0x4b, 0x03, 0x04],
  /**
   * Offset of the first entry's file name in a ZIP local file header.
   * An EPUB stores `mimetype` first, uncompressed, so its name and content follow here.
   */
  epubMimetypeOffset: 30,
  /** `mimetypeapplication/epub+zip` */
  epubMimetype: [
    0x6d, 0x69, 0x6d, 0x65, 0x74, 0x79, 0x70, 0x65, 0x61, 0x70, 0x70, 0x6c, 0x69, 0x63, 0x61,
    0x74, 0x69, 0x6f, 0x6e, 0x2f, 0x65, 0x70, 0x75, 0x62, 0x2b, 0x7a, 0x69, 0x70,
  ],
} as const;

/**
 * Output key to engine lookup key for every metadata field.
 *
 * The order here is the order of keys in a metadata record.
 */
export const METADATA_LOOKUP_KEYS = {
  format: "format",
  encryption: "encryption",
  title: "info:Title",
  author: "info:Author",
  subject: "info:Subject",
  keywords: "info:Keywords",
  creator: "info:Creator",
  producer: "info:Producer",
  creationDate: "info:CreationDate",
  modDate: "info:ModDate",
} as const;

/**
 * Metadata record keys, derived from the lookup table.
 */
export type MetadataKey = keyof typeof METADATA_LOOKUP_KEYS;

/**
 * Smallest metadata lookup buffer accepted by configuration.
 */
export const MIN_METADATA_BUFFER_BYTES = 16;

/**
 * Largest metadata lookup buffer accepted by configuration.
 */
export const MAX_METADATA_BUFFER_BYTES = 65_536;

/**
 * Upper bound for the configurable outline depth.
 */
export const MAX_OUTLINE_DEPTH_LIMIT = 4_096;

/**
 * Default configuration values for documents.
 *
 * @example
 * ```typescript
 * const config: ExtractorConfig = {
 *   maxFileSizeBytes: DEFAULT_EXTRACTOR_CONFIG.maxFileSizeBytes,
 * };
 * ```
 */
export const DEFAULT_EXTRACTOR_CONFIG = {
  /**
   * Maximum file size: 50MB
   */
  maxFileSizeBytes: 52_428_800,

  /**
   * Metadata lookup buffer: 256 bytes including the terminating NUL
   */
  metadataBufferBytes: 256,

  /**
   * Deepest outline level emitted by the outline walker
   */
  maxOutlineDepth: 256,
} as const;
