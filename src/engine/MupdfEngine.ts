/**
 * Parsing engine backed by MuPDF compiled to WebAssembly (the `mupdf` package).
 *
 * The WebAssembly module is loaded lazily on the first context request and
 * shared by every context afterwards.
 *
 * @module engine/MupdfEngine
 */

import type * as Mupdf from "mupdf";
import { getOptionalComponentLogger } from "../logging/index.js";
import type {
  NativeDocument,
  NativeOutlineNode,
  NativeStream,
  ParsingContext,
  ParsingEngine,
} from "./types.js";

type MupdfModule = typeof Mupdf;

type MupdfOutlineItem = NonNullable<ReturnType<Mupdf.Document["loadOutline"]>>[number];

let cachedModule: Promise<MupdfModule> | null = null;

/**
 * Import the mupdf module once; a failed import is retried on the next call.
 */
function loadMupdfModule(): Promise<MupdfModule> {
  if (cachedModule === null) {
    cachedModule = import("mupdf").catch((error: unknown) => {
      cachedModule = null;
      throw error;
    });
  }
  return cachedModule;
}

class MupdfStream implements NativeStream {
  constructor(
    readonly buffer: Mupdf.Buffer,
    readonly byteLength: number
  ) {}

  drop(): void {
    this.buffer.destroy();
  }
}

class MupdfDocument implements NativeDocument {
  private readonly pdf: Mupdf.PDFDocument | null;

  constructor(
    private readonly mupdf: MupdfModule,
    private readonly document: Mupdf.Document
  ) {
    this.pdf = document.asPDF();
  }

  needsPassword(): boolean {
    return this.document.needsPassword();
  }

  countPages(): number {
    return this.document.countPages();
  }

  countObjects(): number {
    return this.pdf === null ? 0 : this.pdf.countObjects();
  }

  renderPageText(pageIndex: number): string {
    const page = this.document.loadPage(pageIndex);
    try {
      // Structured text is produced at the page's own scale; this API takes no device hints.
      const text = page.toStructuredText();
      try {
        return text.asText();
      } finally {
        text.destroy();
      }
    } finally {
      page.destroy();
    }
  }

  objectSubtype(objectNumber: number): string | null {
    const ref = this.requirePdf().newIndirect(objectNumber);
    try {
      const subtype = ref.resolve().get("Subtype");
      return subtype.isName() ? subtype.asName() : null;
    } finally {
      ref.destroy();
    }
  }

  decodeImageAsPng(objectNumber: number): Uint8Array {
    const pdf = this.requirePdf();
    const ref = pdf.newIndirect(objectNumber);
    try {
      const image = pdf.loadImage(ref);
      try {
        const pixmap = image.toPixmap();
        try {
          return this.encodePng(pixmap);
        } finally {
          pixmap.destroy();
        }
      } finally {
        image.destroy();
      }
    } finally {
      ref.destroy();
    }
  }

  loadOutline(): NativeOutlineNode[] | null {
    const items = this.document.loadOutline();
    if (items === null) {
      return null;
    }

    const roots: NativeOutlineNode[] = [];
    const pending: Array<{ items: MupdfOutlineItem[]; into: NativeOutlineNode[] }> = [
      { items, into: roots },
    ];

    for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
      for (const item of next.items) {
        const node = this.toOutlineNode(item);
        next.into.push(node);
        if (item.down !== undefined && item.down.length > 0) {
          pending.push({ items: item.down, into: node.children });
        }
      }
    }

    return roots;
  }

  lookupMetadata(key: string): string | undefined {
    return this.document.getMetaData(key);
  }

  drop(): void {
    this.document.destroy();
  }

  private requirePdf(): Mupdf.PDFDocument {
    if (this.pdf === null) {
      throw new Error("Document has no cross-reference table");
    }
    return this.pdf;
  }

  /**
   * PNG holds gray or RGB samples only; other color spaces are converted to RGB.
   */
  private encodePng(pixmap: Mupdf.Pixmap): Uint8Array {
    const colorspace = pixmap.getColorSpace();
    if (colorspace === null || colorspace.isGray() || colorspace.isRGB()) {
      return pixmap.asPNG();
    }

    const rgb = pixmap.convertToColorSpace(this.mupdf.ColorSpace.DeviceRGB);
    try {
      return rgb.asPNG();
    } finally {
      rgb.destroy();
    }
  }

  private toOutlineNode(item: MupdfOutlineItem): NativeOutlineNode {
    const uri = item.uri ?? "";
    const page = item.page ?? -1;
    return {
      title: item.title ?? "",
      uri,
      page,
      y: page >= 0 ? this.destinationY(uri) : 0,
      children: [],
    };
  }

  private destinationY(uri: string): number {
    if (uri === "") {
      return 0;
    }
    try {
      const destination = this.document.resolveLinkDestination(uri);
      return Number.isFinite(destination.y) ? destination.y : 0;
    } catch (error) {
      getOptionalComponentLogger("engine:mupdf").debug(
        { uri, error: error instanceof Error ? error.message : String(error) },
        "Outline destination could not be resolved, using top of page"
      );
      return 0;
    }
  }
}

class MupdfContext implements ParsingContext {
  private dropped = false;

  constructor(private readonly mupdf: MupdfModule) {}

  openMemory(bytes: Uint8Array): NativeStream {
    this.assertLive();
    return new MupdfStream(new this.mupdf.Buffer(bytes), bytes.byteLength);
  }

  openDocument(stream: NativeStream, magic: string): NativeDocument {
    this.assertLive();
    if (!(stream instanceof MupdfStream)) {
      throw new TypeError("Stream was not created by a MuPDF context");
    }
    const document = this.mupdf.Document.openDocument(stream.buffer, magic);
    return new MupdfDocument(this.mupdf, document);
  }

  drop(): void {
    this.dropped = true;
  }

  private assertLive(): void {
    if (this.dropped) {
      throw new Error("MuPDF context has been dropped");
    }
  }
}

/**
 * MuPDF-backed parsing engine.
 *
 * @example
 * ```typescript
 * const document = await Document.openFromBytes(bytes, { engine: new MupdfEngine() });
 * ```
 */
export class MupdfEngine implements ParsingEngine {
  readonly name = "mupdf";

  async createContext(): Promise<ParsingContext> {
    const mupdf = await loadMupdfModule();
    return new MupdfContext(mupdf);
  }
}

let defaultEngine: MupdfEngine | null = null;

/**
 * Engine used when no engine is passed to the `Document` factories.
 */
export function getDefaultEngine(): ParsingEngine {
  if (defaultEngine === null) {
    defaultEngine = new MupdfEngine();
  }
  return defaultEngine;
}
