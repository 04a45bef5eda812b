/**
 * Document handle.
 *
 * Owns one parsing context and the document opened in it, and serializes
 * every engine call through a per-document access lock.
 *
 * @module documents/Document
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { resolveExtractorConfig, type ResolvedExtractorConfig } from "../config/extractor-config.js";
import { getDefaultEngine } from "../engine/MupdfEngine.js";
import type {
  NativeDocument,
  NativeStream,
  ParsingContext,
  ParsingEngine,
} from "../engine/types.js";
import { getOptionalComponentLogger } from "../logging/index.js";
import { AccessLock } from "../utils/access-lock.js";
import { DOCUMENT_EXTENSIONS, PDF_MIME_TYPE } from "./constants.js";
import { detectFormat } from "./DocumentTypeDetector.js";
import {
  CreateContextError,
  DocumentClosedError,
  ExtractionError,
  FileAccessError,
  FileTooLargeError,
  LoadOutlineError,
  NeedsPasswordError,
  NoSuchFileError,
  OpenDocumentError,
  OpenMemoryError,
  isDocumentError,
  isNotImageError,
  toError,
} from "./errors.js";
import { extractPageText } from "./extractors/TextExtractor.js";
import { decodePng, extractImageBytes } from "./extractors/ImageExtractor.js";
import { flattenOutline } from "./extractors/OutlineWalker.js";
import { readMetadata } from "./extractors/MetadataReader.js";
import type {
  ByteSource,
  DecodedImage,
  ExtractedImage,
  MetadataRecord,
  OpenOptions,
  OutlineEntry,
  PageText,
} from "./types.js";

/**
 * Where a document was read from, for logs and error context.
 */
type DocumentSource = { kind: "file"; filePath: string } | { kind: "memory" };

/**
 * Everything needed to open a document once its bytes are in memory.
 */
interface OpenRequest {
  bytes: Uint8Array;
  magic: string;
  source: DocumentSource;
  engine: ParsingEngine;
  config: ResolvedExtractorConfig;
}

function getLogger(): ReturnType<typeof getOptionalComponentLogger> {
  return getOptionalComponentLogger("documents:document");
}

/**
 * The `code` of a Node.js system error, if the value carries one.
 */
function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * An open PDF or EPUB document.
 *
 * Create one with `Document.open`, `Document.openFromBytes` or
 * `Document.openFromStream`, and release it with `close()`. Extraction
 * methods may be called concurrently; they run one at a time.
 *
 * @example
 * ```typescript
 * const document = await Document.open("/docs/report.pdf");
 * try {
 *   const firstPage = await document.extractText(0);
 *   const toc = await document.loadOutline();
 *   const metadata = await document.readMetadata();
 * } finally {
 *   await document.close();
 * }
 * ```
 */
export class Document {
  private readonly lock = new AccessLock();
  private closed = false;

  private constructor(
    private readonly context: ParsingContext,
    private readonly native: NativeDocument,
    private readonly config: ResolvedExtractorConfig,
    private readonly source: DocumentSource,
    private readonly pageTotal: number,
    private readonly objectTotal: number
  ) {}

  /**
   * Open a document from the filesystem.
   *
   * The format handler is chosen from the content signature, or from the
   * file extension when the signature is not recognized.
   *
   * @param filePath - Path to the document; relative paths resolve against the working directory
   * @param options - Engine and configuration overrides
   * @throws {NoSuchFileError} If the file does not exist
   * @throws {FileAccessError} If the file cannot be read
   * @throws {FileTooLargeError} If the file exceeds `maxFileSizeBytes`
   * @throws {CreateContextError} If the engine cannot provide a context
   * @throws {OpenMemoryError} If the file contents cannot be staged for the engine
   * @throws {OpenDocumentError} If the document is malformed or unsupported
   * @throws {NeedsPasswordError} If the document is encrypted
   */
  static async open(filePath: string, options?: OpenOptions): Promise<Document> {
    const config = resolveExtractorConfig(options?.config);
    const absolutePath = path.resolve(filePath);

    const size = await Document.statFile(absolutePath);
    if (size > config.maxFileSizeBytes) {
      throw new FileTooLargeError(
        `File exceeds maximum size of ${config.maxFileSizeBytes} bytes (actual: ${size} bytes)`,
        size,
        config.maxFileSizeBytes,
        { filePath: absolutePath }
      );
    }

    let bytes: Uint8Array;
    try {
      bytes = await fs.readFile(absolutePath);
    } catch (error) {
      throw new FileAccessError(`Cannot read file: ${absolutePath}`, {
        filePath: absolutePath,
        cause: toError(error),
      });
    }

    const format = detectFormat(bytes);

    return Document.openResolved({
      bytes,
      magic: format === "" ? absolutePath : format,
      source: { kind: "file", filePath: absolutePath },
      engine: options?.engine ?? getDefaultEngine(),
      config,
    });
  }

  /**
   * Open a document from bytes already in memory.
   *
   * The format handler is chosen from the content signature, defaulting to PDF.
   *
   * @param bytes - Document content
   * @param options - Engine and configuration overrides
   * @throws {CreateContextError} If the engine cannot provide a context
   * @throws {OpenMemoryError} If the memory-backed stream cannot be created
   * @throws {OpenDocumentError} If the document is malformed or unsupported
   * @throws {NeedsPasswordError} If the document is encrypted
   */
  static async openFromBytes(bytes: Uint8Array, options?: OpenOptions): Promise<Document> {
    const config = resolveExtractorConfig(options?.config);
    const format = detectFormat(bytes);

    return Document.openResolved({
      bytes,
      magic: format === "" ? PDF_MIME_TYPE : format,
      source: { kind: "memory" },
      engine: options?.engine ?? getDefaultEngine(),
      config,
    });
  }

  /**
   * Drain a byte stream into memory and open the result.
   *
   * Errors raised while reading the stream are rethrown unchanged.
   *
   * @param source - Any async iterable of chunks, e.g. a Node.js readable stream
   * @param options - Engine and configuration overrides
   *
   * @example
   * ```typescript
   * const document = await Document.openFromStream(fs.createReadStream("/docs/book.epub"));
   * ```
   */
  static async openFromStream(source: ByteSource, options?: OpenOptions): Promise<Document> {
    const chunks: Buffer[] = [];
    for await (const chunk of source) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
    }
    return Document.openFromBytes(Buffer.concat(chunks), options);
  }

  /**
   * Check if a file extension names a format this class opens.
   *
   * @param extension - File extension including dot (e.g., ".pdf")
   */
  static supports(extension: string): boolean {
    const normalizedExt = extension.toLowerCase();
    return (
      DOCUMENT_EXTENSIONS.pdf.some((ext) => ext === normalizedExt) ||
      DOCUMENT_EXTENSIONS.epub.some((ext) => ext === normalizedExt)
    );
  }

  /**
   * Number of pages, fixed when the document was opened.
   */
  get pageCount(): number {
    return this.pageTotal;
  }

  /**
   * Number of cross-reference entries, fixed when the document was opened.
   *
   * Valid object numbers are `1` to `objectCount - 1`. EPUB documents have none.
   */
  get objectCount(): number {
    return this.objectTotal;
  }

  /**
   * Whether `close()` has been called.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Absolute path of the file the document was opened from, if any.
   */
  get filePath(): string | undefined {
    return this.source.kind === "file" ? this.source.filePath : undefined;
  }

  /**
   * Extract the text of one page.
   *
   * @param pageIndex - 0-based page index
   * @returns Page text, possibly empty
   * @throws {PageMissingError} If `pageIndex` is outside `[0, pageCount)`
   * @throws {DocumentClosedError} If the document has been closed
   * @throws {ExtractionError} If the engine fails
   */
  async extractText(pageIndex: number): Promise<string> {
    return this.withNative("extract text", (native) =>
      extractPageText(native, pageIndex, this.pageTotal)
    );
  }

  /**
   * Extract the text of every page, in page order.
   *
   * Each page is extracted under its own lock acquisition.
   */
  async extractAllText(): Promise<PageText[]> {
    const pages: PageText[] = [];
    for (let pageIndex = 0; pageIndex < this.pageTotal; pageIndex++) {
      pages.push({ pageIndex, text: await this.extractText(pageIndex) });
    }
    return pages;
  }

  /**
   * Decode an image object and return it PNG-encoded.
   *
   * @param objectNumber - Indirect object number, `1` to `objectCount - 1`
   * @returns PNG bytes
   * @throws {ObjectMissingError} If `objectNumber` is out of range
   * @throws {NotImageError} If the object is not an image; skip it when scanning
   * @throws {DocumentClosedError} If the document has been closed
   * @throws {ExtractionError} If the engine fails to decode the image
   */
  async extractImageBytes(objectNumber: number): Promise<Uint8Array> {
    return this.withNative("extract image", (native) =>
      extractImageBytes(native, objectNumber, this.objectTotal)
    );
  }

  /**
   * Decode an image object into an RGBA pixel buffer.
   *
   * Same contract as `extractImageBytes`; the PNG is decoded outside the lock.
   */
  async extractImage(objectNumber: number): Promise<DecodedImage> {
    const bytes = await this.extractImageBytes(objectNumber);
    return decodePng(bytes);
  }

  /**
   * Extract every image object, skipping objects that are not images.
   *
   * @returns Images in object number order
   */
  async scanImages(): Promise<ExtractedImage[]> {
    const images: ExtractedImage[] = [];
    for (let objectNumber = 1; objectNumber < this.objectTotal; objectNumber++) {
      try {
        images.push({ objectNumber, bytes: await this.extractImageBytes(objectNumber) });
      } catch (error) {
        if (isNotImageError(error)) {
          continue;
        }
        throw error;
      }
    }

    getLogger().debug(
      { objectCount: this.objectTotal, imageCount: images.length },
      "Image scan complete"
    );
    return images;
  }

  /**
   * Load the table of contents as a flat, depth-first list.
   *
   * @returns Entries in pre-order; empty when the outline exists but has no items
   * @throws {LoadOutlineError} If the document has no outline
   * @throws {DocumentClosedError} If the document has been closed
   */
  async loadOutline(): Promise<OutlineEntry[]> {
    return this.withNative("load outline", (native) => {
      const roots = native.loadOutline();
      if (roots === null) {
        throw new LoadOutlineError("Document has no outline", { filePath: this.filePath });
      }

      const { entries, truncated } = flattenOutline(roots, this.config.maxOutlineDepth);
      if (truncated) {
        getLogger().warn(
          { maxOutlineDepth: this.config.maxOutlineDepth, entryCount: entries.length },
          "Outline deeper than the configured limit, deeper entries dropped"
        );
      }
      return entries;
    });
  }

  /**
   * Read the ten standard metadata fields.
   *
   * Every key is present; unavailable fields are empty strings.
   *
   * @throws {DocumentClosedError} If the document has been closed
   */
  async readMetadata(): Promise<MetadataRecord> {
    return this.withNative("read metadata", (native) =>
      readMetadata(native, this.config.metadataBufferBytes)
    );
  }

  /**
   * Release the document, then its context.
   *
   * Waits for an in-flight operation to finish. Calling `close()` again is a no-op.
   */
  async close(): Promise<void> {
    await this.lock.runExclusive(() => {
      if (this.closed) {
        return;
      }
      this.closed = true;
      Document.release(this.context, this.native);
      getLogger().debug({ source: this.source }, "Document closed");
    });
  }

  /**
   * Run an engine call sequence under the access lock.
   *
   * Document errors pass through; anything else the engine throws becomes
   * an ExtractionError.
   */
  private async withNative<T>(operation: string, task: (native: NativeDocument) => T): Promise<T> {
    return this.lock.runExclusive(() => {
      if (this.closed) {
        throw new DocumentClosedError(operation, { filePath: this.filePath });
      }
      try {
        return task(this.native);
      } catch (error) {
        if (isDocumentError(error)) {
          throw error;
        }
        const cause = toError(error);
        getLogger().error({ err: cause, operation, source: this.source }, "Engine call failed");
        throw new ExtractionError(`Failed to ${operation}: ${cause.message}`, {
          filePath: this.filePath,
          cause,
        });
      }
    });
  }

  /**
   * Stat a file, mapping a missing path to NoSuchFileError.
   */
  private static async statFile(filePath: string): Promise<number> {
    try {
      const stats = await fs.stat(filePath);
      return stats.size;
    } catch (error) {
      const cause = toError(error);
      const code = errnoCode(error);
      if (code === "ENOENT" || code === "ENOTDIR") {
        throw new NoSuchFileError(`File not found: ${filePath}`, { filePath, cause });
      }
      if (code === "EACCES") {
        throw new FileAccessError(`Permission denied: ${filePath}`, { filePath, cause });
      }
      throw new FileAccessError(`Cannot access file: ${filePath}`, { filePath, cause });
    }
  }

  /**
   * Create the context, open the document and read its counts.
   *
   * Whatever was allocated is released before an error leaves this method.
   */
  private static async openResolved(request: OpenRequest): Promise<Document> {
    const { bytes, magic, source, engine, config } = request;
    const filePath = source.kind === "file" ? source.filePath : undefined;

    let context: ParsingContext;
    try {
      context = await engine.createContext();
    } catch (error) {
      throw new CreateContextError(`Cannot create ${engine.name} context`, {
        filePath,
        cause: toError(error),
      });
    }

    let native: NativeDocument | null = null;
    try {
      native = Document.openNative(context, bytes, magic, filePath);

      if (native.needsPassword()) {
        throw new NeedsPasswordError("Document is encrypted and needs a password", { filePath });
      }

      const pageTotal = native.countPages();
      const objectTotal = native.countObjects();

      getLogger().debug(
        { source, engine: engine.name, magic, pageCount: pageTotal, objectCount: objectTotal },
        "Document opened"
      );
      return new Document(context, native, config, source, pageTotal, objectTotal);
    } catch (error) {
      Document.release(context, native);

      const documentError = isDocumentError(error)
        ? error
        : new OpenDocumentError(`Cannot open document: ${toError(error).message}`, {
            filePath,
            cause: toError(error),
          });
      getLogger().warn({ source, code: documentError.code }, "Document could not be opened");
      throw documentError;
    }
  }

  /**
   * Stage the bytes in a memory stream and parse them; the stream is
   * dropped once the document holds its own reference.
   */
  private static openNative(
    context: ParsingContext,
    bytes: Uint8Array,
    magic: string,
    filePath: string | undefined
  ): NativeDocument {
    let stream: NativeStream;
    try {
      stream = context.openMemory(bytes);
    } catch (error) {
      throw new OpenMemoryError(`Cannot open memory stream of ${bytes.byteLength} bytes`, {
        filePath,
        cause: toError(error),
      });
    }

    try {
      return context.openDocument(stream, magic);
    } catch (error) {
      throw new OpenDocumentError(`Cannot open document: ${toError(error).message}`, {
        filePath,
        cause: toError(error),
      });
    } finally {
      stream.drop();
    }
  }

  /**
   * Drop the document before the context that owns it.
   */
  private static release(context: ParsingContext, native: NativeDocument | null): void {
    try {
      native?.drop();
    } finally {
      context.drop();
    }
  }
}
