/**
 * Document extractors.
 *
 * @module documents/extractors
 */

export { extractPageText, assertPageIndex } from "./TextExtractor.js";
export {
  extractImageBytes,
  decodePng,
  assertObjectNumber,
  IMAGE_SUBTYPE,
} from "./ImageExtractor.js";
export { flattenOutline } from "./OutlineWalker.js";
export type { FlattenedOutline } from "./OutlineWalker.js";
export { readMetadata, truncateToByteLength, trimTrailingNul } from "./MetadataReader.js";
