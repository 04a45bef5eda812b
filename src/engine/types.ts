/**
 * Parsing engine contract.
 *
 * A document is parsed by a native engine reached through these interfaces.
 * Engine objects are not reentrant: callers must serialize every call made on
 * a context and on the documents it opened.
 *
 * @module engine/types
 */

/**
 * Entry point of a parsing engine.
 *
 * @example
 * ```typescript
 * const context = await engine.createContext();
 * const stream = context.openMemory(bytes);
 * try {
 *   const native = context.openDocument(stream, "application/pdf");
 * } finally {
 *   stream.drop();
 * }
 * ```
 */
export interface ParsingEngine {
  /**
   * Engine name used in logs.
   */
  readonly name: string;

  /**
   * Allocate a fresh parsing context with the document handlers registered.
   *
   * @throws When the engine cannot be loaded or the context cannot be allocated
   */
  createContext(): Promise<ParsingContext>;
}

/**
 * Memory-backed stream over a document's bytes.
 */
export interface NativeStream {
  readonly byteLength: number;
  drop(): void;
}

/**
 * Low-level parser state owning the documents it opens.
 */
export interface ParsingContext {
  /**
   * Wrap bytes in a memory-backed stream.
   *
   * @throws When the stream cannot be created
   */
  openMemory(bytes: Uint8Array): NativeStream;

  /**
   * Parse a document from a stream.
   *
   * @param magic - File name or MIME type selecting the format handler
   * @throws When the document is malformed or its format unsupported
   */
  openDocument(stream: NativeStream, magic: string): NativeDocument;

  /**
   * Release the context. Every document opened from it must be dropped first.
   */
  drop(): void;
}

/**
 * One node of the native outline tree.
 */
export interface NativeOutlineNode {
  title: string;
  uri: string;
  /**
   * 0-based target page, -1 for links leaving the document.
   */
  page: number;
  /**
   * Y coordinate of the destination on the target page.
   */
  y: number;
  children: NativeOutlineNode[];
}

/**
 * A parsed document.
 */
export interface NativeDocument {
  needsPassword(): boolean;

  countPages(): number;

  /**
   * Number of entries in the cross-reference table (0 when the format has none).
   */
  countObjects(): number;

  /**
   * Run a page's content through a structured-text device with an identity
   * transform and no render cache, flattened in reading order.
   */
  renderPageText(pageIndex: number): string;

  /**
   * Value of the `Subtype` name of an indirect object's dictionary, or null.
   */
  objectSubtype(objectNumber: number): string | null;

  /**
   * Decode an image object and re-encode it as PNG.
   */
  decodeImageAsPng(objectNumber: number): Uint8Array;

  /**
   * Load the outline tree; null when the document has no outline.
   */
  loadOutline(): NativeOutlineNode[] | null;

  /**
   * Look up a metadata string by engine key (`format`, `info:Title`, ...).
   */
  lookupMetadata(key: string): string | undefined;

  drop(): void;
}
