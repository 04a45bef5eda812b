/**
 * Parsing engine module.
 *
 * @module engine
 */

export type {
  ParsingEngine,
  ParsingContext,
  NativeStream,
  NativeDocument,
  NativeOutlineNode,
} from "./types.js";

export { MupdfEngine, getDefaultEngine } from "./MupdfEngine.js";
