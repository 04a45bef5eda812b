/**
 * Document format detection.
 *
 * Classifies raw bytes as PDF or EPUB by their leading signature, and file
 * paths by extension.
 *
 * @module documents/DocumentTypeDetector
 */

import * as path from "node:path";
import { EPUB_MIME_TYPE, MAGIC_BYTES, MIME_TYPES, PDF_MIME_TYPE } from "./constants.js";
import type { DocumentFormat } from "./types.js";

/**
 * Compare `signature` against `bytes` starting at `offset`.
 */
function matchesAt(bytes: Uint8Array, offset: number, signature: readonly number[]): boolean {
  if (bytes.length < offset + signature.length) {
    return false;
  }
  for (let i = 0; i < signature.length; i++) {
    if (bytes[offset + i] !== signature[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Detect a document format from its leading bytes.
 *
 * - `%PDF` at offset 0 is a PDF.
 * - A ZIP local file header at offset 0 followed by `mimetypeapplication/epub+zip`
 *   at bytes 30–57 is an EPUB: its first entry is the stored `mimetype` file.
 *
 * @param bytes - Document content, or at least its first 58 bytes
 * @returns MIME type, or an empty string when no signature matches
 *
 * @example
 * ```typescript
 * detectFormat(new TextEncoder().encode("%PDF-1.7")); // "application/pdf"
 * detectFormat(new Uint8Array([0x50, 0x4b])); // ""
 * ```
 */
export function detectFormat(bytes: Uint8Array): DocumentFormat {
  if (matchesAt(bytes, 0, MAGIC_BYTES.pdf)) {
    return PDF_MIME_TYPE;
  }
  if (
    matchesAt(bytes, 0, MAGIC_BYTES.zipLocalFileHeader) &&
    matchesAt(bytes, MAGIC_BYTES.epubMimetypeOffset, MAGIC_BYTES.epubMimetype)
  ) {
    return EPUB_MIME_TYPE;
  }
  return "";
}

/**
 * Detects document formats from content or file names.
 *
 * @example
 * ```typescript
 * const detector = new DocumentTypeDetector();
 *
 * detector.detect(await fs.readFile("/path/to/book.epub")); // "application/epub+zip"
 * detector.detectFromExtension("/path/to/report.PDF"); // "application/pdf"
 * ```
 */
export class DocumentTypeDetector {
  /**
   * Detect a document format from content.
   *
   * @param bytes - Document content
   * @returns Detected MIME type or an empty string
   */
  detect(bytes: Uint8Array): DocumentFormat {
    return detectFormat(bytes);
  }

  /**
   * Detect a document format from a file extension.
   *
   * Extensions are normalized to lowercase for matching.
   *
   * @param filePath - Path to the file (absolute or relative)
   * @returns MIME type mapped from the extension, or an empty string
   *
   * @example
   * ```typescript
   * detector.detectFromExtension("/path/to/report.pdf"); // "application/pdf"
   * detector.detectFromExtension("/path/to/book.epub"); // "application/epub+zip"
   * detector.detectFromExtension("/path/to/notes.txt"); // ""
   * ```
   */
  detectFromExtension(filePath: string): DocumentFormat {
    const mimeType = MIME_TYPES[this.getExtension(filePath)];
    if (mimeType === PDF_MIME_TYPE || mimeType === EPUB_MIME_TYPE) {
      return mimeType;
    }
    return "";
  }

  /**
   * Check if content is a supported document.
   *
   * @param bytes - Document content
   */
  isSupported(bytes: Uint8Array): boolean {
    return this.detect(bytes) !== "";
  }

  /**
   * Get the file extension from a path.
   *
   * @param filePath - Path to the file
   * @returns Lowercase extension including dot, or empty string
   *
   * @example
   * ```typescript
   * detector.getExtension("/path/to/file.PDF"); // ".pdf"
   * detector.getExtension("/path/to/file"); // ""
   * ```
   */
  getExtension(filePath: string): string {
    return path.extname(filePath).toLowerCase();
  }
}
