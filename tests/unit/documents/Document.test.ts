/**
 * Unit tests for the Document handle.
 *
 * Runs every operation against the in-process fake engine and checks error
 * mapping, resource release and serialization.
 */

import { describe, test, expect, beforeAll, afterAll, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { Document } from "../../../src/documents/Document.js";
import {
  CreateContextError,
  DocumentClosedError,
  ExtractionError,
  FileAccessError,
  FileTooLargeError,
  LoadOutlineError,
  NeedsPasswordError,
  NoSuchFileError,
  NotImageError,
  ObjectMissingError,
  OpenDocumentError,
  OpenMemoryError,
  PageMissingError,
} from "../../../src/documents/errors.js";
import { initializeLogger, resetLogger } from "../../../src/logging/index.js";
import { FakeEngine, encodeRgbaPng, outlineNode } from "../../helpers/fake-engine.js";
import { createLogCapture } from "../../helpers/log-capture.js";

const PDF_BYTES = new TextEncoder().encode("%PDF-1.4\n");

function epubBytes(): Uint8Array {
  const bytes = new Uint8Array(64);
  bytes.set([0x50, 0x4b, 0x03, 0x04]);
  bytes.set(new TextEncoder().encode("mimetypeapplication/epub+zip"), 30);
  return bytes;
}

describe("Document", () => {
  afterEach(() => {
    resetLogger();
  });

  describe("openFromBytes", () => {
    test("reads page and object counts once", async () => {
      const engine = new FakeEngine({ pages: ["one", "two"], objectCount: 9 });

      const document = await Document.openFromBytes(PDF_BYTES, { engine });

      expect(document.pageCount).toBe(2);
      expect(document.objectCount).toBe(9);
      expect(document.isClosed).toBe(false);
      expect(document.filePath).toBeUndefined();
      expect(engine.log.calls).toEqual([
        "createContext",
        "openMemory:9",
        "openDocument",
        "needsPassword",
        "countPages",
        "countObjects",
      ]);
      await document.close();
    });

    test("selects the handler from the content signature", async () => {
      const engine = new FakeEngine();

      const pdf = await Document.openFromBytes(PDF_BYTES, { engine });
      const epub = await Document.openFromBytes(epubBytes(), { engine });
      const unknown = await Document.openFromBytes(new TextEncoder().encode("hello"), { engine });

      expect(engine.log.magics).toEqual(["application/pdf", "application/epub+zip", "application/pdf"]);
      await Promise.all([pdf.close(), epub.close(), unknown.close()]);
    });

    test("drops the staging stream once the document is open", async () => {
      const engine = new FakeEngine({ pages: ["one"] });

      const document = await Document.openFromBytes(PDF_BYTES, { engine });

      expect(engine.log.drops).toEqual(["stream"]);
      await document.close();
    });

    test("maps context creation failures to CreateContextError", async () => {
      const cause = new Error("out of memory");
      const engine = new FakeEngine({}, { createContext: cause });

      const error = await Document.openFromBytes(PDF_BYTES, { engine }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CreateContextError);
      expect(error).toHaveProperty("message", "Cannot create fake context");
      expect(error).toHaveProperty("cause", cause);
    });

    test("releases the context when the memory stream cannot be created", async () => {
      const engine = new FakeEngine({}, { openMemory: new Error("alloc failed") });

      await expect(Document.openFromBytes(PDF_BYTES, { engine })).rejects.toThrow(
        new OpenMemoryError("Cannot open memory stream of 9 bytes")
      );
      expect(engine.log.drops).toEqual(["context"]);
    });

    test("releases the stream and context when the engine rejects the document", async () => {
      const engine = new FakeEngine({}, { openDocument: new Error("broken xref") });

      await expect(Document.openFromBytes(PDF_BYTES, { engine })).rejects.toThrow(OpenDocumentError);
      await expect(Document.openFromBytes(PDF_BYTES, { engine })).rejects.toThrow(
        "Cannot open document: broken xref"
      );
      expect(engine.log.drops).toEqual(["stream", "context", "stream", "context"]);
    });

    test("releases everything before reporting an encrypted document", async () => {
      const engine = new FakeEngine({ pages: ["secret"], needsPassword: true });

      await expect(Document.openFromBytes(PDF_BYTES, { engine })).rejects.toThrow(NeedsPasswordError);
      expect(engine.log.drops).toEqual(["stream", "document", "context"]);
      expect(engine.log.calls).not.toContain("countPages");
    });

    test("rejects invalid configuration before touching the engine", async () => {
      const engine = new FakeEngine();

      await expect(
        Document.openFromBytes(PDF_BYTES, { engine, config: { maxOutlineDepth: 0 } })
      ).rejects.toThrow(/^Invalid extractor configuration: maxOutlineDepth: /);
      expect(engine.log.calls).toEqual([]);
    });

    test("logs the opened document at debug level", async () => {
      const capture = createLogCapture();
      initializeLogger({ level: "debug", format: "json", stream: capture.stream });
      const engine = new FakeEngine({ pages: ["one", "two", "three"] });

      const document = await Document.openFromBytes(PDF_BYTES, { engine });
      await document.close();

      const logs = capture.getByComponent("documents:document");
      expect(logs.map((log) => log.msg)).toEqual(["Document opened", "Document closed"]);
      expect(logs[0]?.pageCount).toBe(3);
      expect(logs[0]?.engine).toBe("fake");
      expect(logs[0]?.magic).toBe("application/pdf");
    });

    test("logs a warning when a document cannot be opened", async () => {
      const capture = createLogCapture();
      initializeLogger({ level: "warn", format: "json", stream: capture.stream });
      const engine = new FakeEngine({ needsPassword: true });

      await expect(Document.openFromBytes(PDF_BYTES, { engine })).rejects.toThrow(NeedsPasswordError);

      const warning = capture.find((log) => log.msg === "Document could not be opened");
      expect(warning?.code).toBe("NEEDS_PASSWORD");
      expect(warning?.level).toBe("warn");
    });
  });

  describe("openFromStream", () => {
    test("concatenates string and byte chunks", async () => {
      async function* chunks(): AsyncGenerator<Uint8Array | string> {
        yield "%PDF";
        yield new Uint8Array([0x2d, 0x31]);
      }
      const engine = new FakeEngine({ pages: ["streamed"] });

      const document = await Document.openFromStream(chunks(), { engine });

      expect(engine.log.calls).toContain("openMemory:6");
      expect(engine.log.magics).toEqual(["application/pdf"]);
      expect(await document.extractText(0)).toBe("streamed");
      await document.close();
    });

    test("rethrows read errors unchanged without creating a context", async () => {
      const readError = new Error("connection reset");
      async function* failing(): AsyncGenerator<Uint8Array> {
        yield PDF_BYTES;
        throw readError;
      }
      const engine = new FakeEngine();

      await expect(Document.openFromStream(failing(), { engine })).rejects.toBe(readError);
      expect(engine.log.calls).toEqual([]);
    });
  });

  describe("open", () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "document-open-"));
    });

    afterAll(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    test("opens a file and records its absolute path", async () => {
      const filePath = path.join(tempDir, "report.pdf");
      await fs.writeFile(filePath, PDF_BYTES);
      const engine = new FakeEngine({ pages: ["from disk"] });

      const document = await Document.open(path.relative(process.cwd(), filePath), { engine });

      expect(document.filePath).toBe(filePath);
      expect(engine.log.magics).toEqual(["application/pdf"]);
      expect(await document.extractText(0)).toBe("from disk");
      await document.close();
    });

    test("falls back to the path when the content is not recognized", async () => {
      const filePath = path.join(tempDir, "unsniffable.epub");
      await fs.writeFile(filePath, "plain text");
      const engine = new FakeEngine();

      const document = await Document.open(filePath, { engine });

      expect(engine.log.magics).toEqual([filePath]);
      await document.close();
    });

    test("throws NoSuchFileError for a missing file", async () => {
      const filePath = path.join(tempDir, "missing.pdf");
      const engine = new FakeEngine();

      const error = await Document.open(filePath, { engine }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NoSuchFileError);
      expect(error).toHaveProperty("message", `File not found: ${filePath}`);
      expect(error).toHaveProperty("filePath", filePath);
      expect(engine.log.calls).toEqual([]);
    });

    test("throws NoSuchFileError when a parent is not a directory", async () => {
      const filePath = path.join(tempDir, "plain-file.txt");
      await fs.writeFile(filePath, "x");

      await expect(
        Document.open(path.join(filePath, "child.pdf"), { engine: new FakeEngine() })
      ).rejects.toThrow(NoSuchFileError);
    });

    test("throws FileAccessError when the path cannot be read as a file", async () => {
      await expect(Document.open(tempDir, { engine: new FakeEngine() })).rejects.toThrow(
        new FileAccessError(`Cannot read file: ${tempDir}`)
      );
    });

    test("throws FileTooLargeError above the configured size", async () => {
      const filePath = path.join(tempDir, "large.pdf");
      await fs.writeFile(filePath, Buffer.alloc(100, 0x20));
      const engine = new FakeEngine();

      const error = await Document.open(filePath, {
        engine,
        config: { maxFileSizeBytes: 10 },
      }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileTooLargeError);
      expect(error).toHaveProperty("actualSizeBytes", 100);
      expect(error).toHaveProperty("maxSizeBytes", 10);
      expect(engine.log.calls).toEqual([]);
    });
  });

  describe("supports", () => {
    test("accepts PDF and EPUB extensions in any case", () => {
      expect(Document.supports(".pdf")).toBe(true);
      expect(Document.supports(".EPUB")).toBe(true);
      expect(Document.supports(".docx")).toBe(false);
      expect(Document.supports("pdf")).toBe(false);
    });
  });

  describe("extractText", () => {
    test("returns the text of each page", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, {
        engine: new FakeEngine({ pages: ["first page", "", "third page"] }),
      });

      expect(await document.extractText(0)).toBe("first page");
      expect(await document.extractText(1)).toBe("");
      expect(await document.extractText(2)).toBe("third page");
      await document.close();
    });

    test("rejects missing pages", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, {
        engine: new FakeEngine({ pages: ["only"] }),
      });

      await expect(document.extractText(1)).rejects.toThrow(
        new PageMissingError(1, 1)
      );
      await expect(document.extractText(-1)).rejects.toThrow(PageMissingError);
      await document.close();
    });

    test("wraps engine failures in ExtractionError and stays usable", async () => {
      const cause = new Error("render failed");
      const engine = new FakeEngine({ pages: ["one"] }, { renderPageText: cause });
      const document = await Document.openFromBytes(PDF_BYTES, { engine });

      const error = await document.extractText(0).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExtractionError);
      expect(error).toHaveProperty("message", "Failed to extract text: render failed");
      expect(error).toHaveProperty("cause", cause);
      expect(await document.readMetadata()).toHaveProperty("title", "");
      await document.close();
    });

    test("extractAllText returns every page in order", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, {
        engine: new FakeEngine({ pages: ["a", "b", "c"] }),
      });

      expect(await document.extractAllText()).toEqual([
        { pageIndex: 0, text: "a" },
        { pageIndex: 1, text: "b" },
        { pageIndex: 2, text: "c" },
      ]);
      await document.close();
    });
  });

  describe("images", () => {
    const red = encodeRgbaPng(1, 1, [255, 0, 0, 255]);
    const blue = encodeRgbaPng(2, 1, [0, 0, 255, 255, 0, 0, 255, 0]);

    function imageEngine(): FakeEngine {
      return new FakeEngine({
        objectCount: 6,
        objects: { 1: "Form", 2: "Image", 4: "Image", 5: "Type1" },
        images: { 2: red, 4: blue },
      });
    }

    test("extractImageBytes returns PNG bytes", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, { engine: imageEngine() });

      expect(await document.extractImageBytes(2)).toBe(red);
      await document.close();
    });

    test("extractImageBytes distinguishes missing objects from non-images", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, { engine: imageEngine() });

      await expect(document.extractImageBytes(0)).rejects.toThrow(ObjectMissingError);
      await expect(document.extractImageBytes(6)).rejects.toThrow(ObjectMissingError);
      await expect(document.extractImageBytes(1)).rejects.toThrow(NotImageError);
      await expect(document.extractImageBytes(3)).rejects.toThrow(NotImageError);
      await document.close();
    });

    test("extractImage decodes to RGBA", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, { engine: imageEngine() });

      const image = await document.extractImage(4);

      expect(image.width).toBe(2);
      expect(image.height).toBe(1);
      expect(Array.from(image.data)).toEqual([0, 0, 255, 255, 0, 0, 255, 0]);
      await document.close();
    });

    test("scanImages skips objects that are not images", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, { engine: imageEngine() });

      const images = await document.scanImages();

      expect(images.map((image) => image.objectNumber)).toEqual([2, 4]);
      expect(images[1]?.bytes).toBe(blue);
      await document.close();
    });

    test("scanImages returns nothing for documents without objects", async () => {
      const document = await Document.openFromBytes(epubBytes(), {
        engine: new FakeEngine({ pages: ["chapter"] }),
      });

      expect(document.objectCount).toBe(0);
      expect(await document.scanImages()).toEqual([]);
      await document.close();
    });

    test("scanImages propagates decode failures", async () => {
      const engine = new FakeEngine(
        { objects: { 1: "Image" }, images: { 1: red } },
        { decodeImage: new Error("corrupt stream") }
      );
      const document = await Document.openFromBytes(PDF_BYTES, { engine });

      await expect(document.scanImages()).rejects.toThrow(
        new ExtractionError("Failed to extract image: corrupt stream")
      );
      await document.close();
    });
  });

  describe("loadOutline", () => {
    test("flattens the outline in pre-order", async () => {
      const engine = new FakeEngine({
        pages: ["1", "2", "3"],
        outline: [outlineNode("Intro", [outlineNode("Scope", [], 1, 92)]), outlineNode("Summary", [], 2)],
      });
      const document = await Document.openFromBytes(PDF_BYTES, { engine });

      const entries = await document.loadOutline();

      expect(entries.map((entry) => [entry.level, entry.title, entry.targetPage])).toEqual([
        [1, "Intro", 0],
        [2, "Scope", 1],
        [1, "Summary", 2],
      ]);
      expect(entries[1]?.verticalOffset).toBe(92);
      await document.close();
    });

    test("returns an empty list for an empty outline", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, {
        engine: new FakeEngine({ outline: [] }),
      });

      expect(await document.loadOutline()).toEqual([]);
      await document.close();
    });

    test("throws LoadOutlineError when the document has no outline", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, {
        engine: new FakeEngine({ outline: null }),
      });

      await expect(document.loadOutline()).rejects.toThrow(
        new LoadOutlineError("Document has no outline")
      );
      await document.close();
    });

    test("drops entries beyond the configured depth with a warning", async () => {
      const capture = createLogCapture();
      initializeLogger({ level: "warn", format: "json", stream: capture.stream });
      const engine = new FakeEngine({
        outline: [outlineNode("Part", [outlineNode("Chapter", [outlineNode("Section")])])],
      });
      const document = await Document.openFromBytes(PDF_BYTES, {
        engine,
        config: { maxOutlineDepth: 2 },
      });

      const entries = await document.loadOutline();

      expect(entries.map((entry) => entry.title)).toEqual(["Part", "Chapter"]);
      const warning = capture.find(
        (log) => log.msg === "Outline deeper than the configured limit, deeper entries dropped"
      );
      expect(warning?.maxOutlineDepth).toBe(2);
      expect(warning?.entryCount).toBe(2);
      await document.close();
    });
  });

  describe("readMetadata", () => {
    test("bounds values by the configured buffer size", async () => {
      const engine = new FakeEngine({
        metadata: { format: "PDF 1.4", "info:Title": "A title that is longer than fifteen bytes" },
      });
      const document = await Document.openFromBytes(PDF_BYTES, {
        engine,
        config: { metadataBufferBytes: 16 },
      });

      const metadata = await document.readMetadata();

      expect(metadata.format).toBe("PDF 1.4");
      expect(metadata.title).toBe("A title that is");
      expect(metadata.modDate).toBe("");
      await document.close();
    });
  });

  describe("close", () => {
    test("drops the document before its context, exactly once", async () => {
      const engine = new FakeEngine({ pages: ["one"] });
      const document = await Document.openFromBytes(PDF_BYTES, { engine });

      await document.close();
      await document.close();

      expect(document.isClosed).toBe(true);
      expect(engine.log.drops).toEqual(["stream", "document", "context"]);
    });

    test("rejects operations after close", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, {
        engine: new FakeEngine({ pages: ["one"], objects: { 1: "Image" }, outline: [] }),
      });
      await document.close();

      await expect(document.extractText(0)).rejects.toThrow(
        new DocumentClosedError("extract text")
      );
      await expect(document.extractImageBytes(1)).rejects.toThrow(
        "Cannot extract image: document is closed"
      );
      await expect(document.loadOutline()).rejects.toThrow(DocumentClosedError);
      await expect(document.readMetadata()).rejects.toThrow(DocumentClosedError);
    });

    test("waits for operations queued before it", async () => {
      const document = await Document.openFromBytes(PDF_BYTES, {
        engine: new FakeEngine({ pages: ["queued"] }),
      });

      const before = document.extractText(0);
      const closing = document.close();
      const after = document.extractText(0).catch((e: unknown) => e);

      expect(await before).toBe("queued");
      await closing;
      expect(await after).toBeInstanceOf(DocumentClosedError);
    });
  });

  describe("serialization", () => {
    test("never runs two engine calls at once", async () => {
      const engine = new FakeEngine({
        pages: ["a", "b", "c"],
        objects: { 1: "Image" },
        images: { 1: encodeRgbaPng(1, 1, [0, 0, 0, 255]) },
        outline: [outlineNode("Only")],
      });
      const document = await Document.openFromBytes(PDF_BYTES, { engine });

      const results = await Promise.all([
        document.extractText(0),
        document.extractImageBytes(1),
        document.loadOutline(),
        document.readMetadata(),
        document.extractText(2),
      ]);

      expect(results[0]).toBe("a");
      expect(results[4]).toBe("c");
      expect(engine.log.overlapped).toBe(false);
      await document.close();
    });
  });
});
