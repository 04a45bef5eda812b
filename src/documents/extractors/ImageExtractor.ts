/**
 * Image extraction from indirect objects.
 *
 * @module documents/extractors/ImageExtractor
 */

import { PNG } from "pngjs";
import type { NativeDocument } from "../../engine/types.js";
import { ExtractionError, NotImageError, ObjectMissingError, toError } from "../errors.js";
import type { DecodedImage } from "../types.js";

/**
 * `Subtype` name marking an image XObject.
 */
export const IMAGE_SUBTYPE = "Image";

/**
 * Check that an object number addresses an entry of the cross-reference table.
 *
 * Object 0 is the head of the free list and never addressable.
 *
 * @param objectNumber - Indirect object number
 * @param objectTotal - Number of cross-reference entries
 * @throws {ObjectMissingError} If the number is not an integer in `[1, objectTotal)`
 */
export function assertObjectNumber(objectNumber: number, objectTotal: number): void {
  if (!Number.isInteger(objectNumber) || objectNumber <= 0 || objectNumber >= objectTotal) {
    throw new ObjectMissingError(objectNumber, objectTotal);
  }
}

/**
 * Decode an image object and return it PNG-encoded.
 *
 * Callers must hold the document's access lock.
 *
 * @param native - Open engine document
 * @param objectNumber - Indirect object number
 * @param objectTotal - Number of cross-reference entries
 * @returns PNG bytes owned by the caller
 * @throws {ObjectMissingError} If the object number is out of range
 * @throws {NotImageError} If the object's `Subtype` is not `Image`
 */
export function extractImageBytes(
  native: NativeDocument,
  objectNumber: number,
  objectTotal: number
): Uint8Array {
  assertObjectNumber(objectNumber, objectTotal);

  if (native.objectSubtype(objectNumber) !== IMAGE_SUBTYPE) {
    throw new NotImageError(objectNumber);
  }

  return native.decodeImageAsPng(objectNumber);
}

/**
 * Decode PNG bytes into an RGBA pixel buffer.
 *
 * Pure JavaScript; does not touch the engine.
 *
 * @param bytes - PNG-encoded image
 * @returns Decoded image
 * @throws {ExtractionError} If the bytes are not a valid PNG
 *
 * @example
 * ```typescript
 * const image = decodePng(await document.extractImageBytes(7));
 * const [r, g, b, a] = image.data.subarray(0, 4);
 * ```
 */
export function decodePng(bytes: Uint8Array): DecodedImage {
  let png: PNG;
  try {
    png = PNG.sync.read(Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength));
  } catch (error) {
    throw new ExtractionError(`Failed to decode PNG image: ${toError(error).message}`, {
      cause: toError(error),
    });
  }

  return {
    width: png.width,
    height: png.height,
    channels: 4,
    data: new Uint8Array(png.data.buffer, png.data.byteOffset, png.data.byteLength),
  };
}
