/**
 * folio-extract - public API
 *
 * Text, image, outline and metadata extraction for PDF and EPUB documents.
 *
 * @example
 * ```typescript
 * import { Document, initializeLogger, loadLoggerConfigFromEnv } from "folio-extract";
 *
 * initializeLogger(loadLoggerConfigFromEnv());
 *
 * const document = await Document.open("report.pdf");
 * try {
 *   const pages = await document.extractAllText();
 *   const outline = await document.loadOutline();
 * } finally {
 *   await document.close();
 * }
 * ```
 */

export * from "./documents/index.js";
export * from "./engine/index.js";
export * from "./config/index.js";
export * from "./logging/index.js";
export { AccessLock } from "./utils/index.js";
