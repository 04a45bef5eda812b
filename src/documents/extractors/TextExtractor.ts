/**
 * Page text extraction.
 *
 * @module documents/extractors/TextExtractor
 */

import type { NativeDocument } from "../../engine/types.js";
import { PageMissingError } from "../errors.js";

/**
 * Check that a page index addresses an existing page.
 *
 * @param pageIndex - 0-based page index
 * @param pageTotal - Number of pages in the document
 * @throws {PageMissingError} If the index is not an integer in `[0, pageTotal)`
 */
export function assertPageIndex(pageIndex: number, pageTotal: number): void {
  if (!Number.isInteger(pageIndex) || pageIndex < 0 || pageIndex >= pageTotal) {
    throw new PageMissingError(pageIndex, pageTotal);
  }
}

/**
 * Extract the text of one page.
 *
 * The page is run through a structured-text device without scaling or
 * rotation and flattened in the engine's reading order. Every intermediate
 * engine object is released before this returns.
 *
 * Callers must hold the document's access lock.
 *
 * @param native - Open engine document
 * @param pageIndex - 0-based page index
 * @param pageTotal - Number of pages in the document
 * @returns Page text, possibly empty
 * @throws {PageMissingError} If the page does not exist
 */
export function extractPageText(
  native: NativeDocument,
  pageIndex: number,
  pageTotal: number
): string {
  assertPageIndex(pageIndex, pageTotal);
  return native.renderPageText(pageIndex);
}
