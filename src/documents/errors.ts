/**
 * Document error classes.
 *
 * Every failure surfaced by a `Document` is one of these classes. Errors carry
 * a code for categorization and support cause chaining.
 *
 * @module documents/errors
 */

/**
 * Options for constructing a DocumentError.
 */
export interface DocumentErrorOptions {
  /**
   * The underlying error that caused this error.
   */
  cause?: Error;

  /**
   * File path associated with the error.
   */
  filePath?: string;
}

/**
 * Error codes used across the document error taxonomy.
 */
export type DocumentErrorCode =
  | "DOCUMENT_ERROR"
  | "NO_SUCH_FILE"
  | "FILE_ACCESS_ERROR"
  | "FILE_TOO_LARGE"
  | "CREATE_CONTEXT_FAILED"
  | "OPEN_DOCUMENT_FAILED"
  | "OPEN_MEMORY_FAILED"
  | "NEEDS_PASSWORD"
  | "PAGE_MISSING"
  | "OBJECT_MISSING"
  | "NOT_IMAGE"
  | "LOAD_OUTLINE_FAILED"
  | "DOCUMENT_CLOSED"
  | "EXTRACTION_ERROR";

/**
 * Base error class for document operations.
 *
 * @example
 * ```typescript
 * try {
 *   await document.extractText(4);
 * } catch (error) {
 *   if (error instanceof DocumentError) {
 *     console.error(`Error [${error.code}]: ${error.message}`);
 *   }
 * }
 * ```
 */
export class DocumentError extends Error {
  public readonly code: DocumentErrorCode;
  public override readonly cause?: Error;
  public readonly filePath?: string;

  constructor(
    message: string,
    code: DocumentErrorCode = "DOCUMENT_ERROR",
    options?: DocumentErrorOptions
  ) {
    super(message);
    this.name = "DocumentError";
    this.code = code;
    this.cause = options?.cause;
    this.filePath = options?.filePath;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (options?.cause?.stack) {
      this.stack = `${this.stack ?? ""}\nCaused by: ${options.cause.stack}`;
    }
  }
}

/**
 * Error thrown when the path given to `Document.open` does not exist.
 */
export class NoSuchFileError extends DocumentError {
  constructor(message: string, options?: DocumentErrorOptions) {
    super(message, "NO_SUCH_FILE", options);
    this.name = "NoSuchFileError";
  }
}

/**
 * Error thrown when an existing file cannot be read (permissions, I/O).
 */
export class FileAccessError extends DocumentError {
  constructor(message: string, options?: DocumentErrorOptions) {
    super(message, "FILE_ACCESS_ERROR", options);
    this.name = "FileAccessError";
  }
}

/**
 * Error thrown when a file exceeds the maximum size limit.
 *
 * @example
 * ```typescript
 * if (stats.size > config.maxFileSizeBytes) {
 *   throw new FileTooLargeError(
 *     `File exceeds maximum size of ${config.maxFileSizeBytes} bytes`,
 *     stats.size,
 *     config.maxFileSizeBytes,
 *     { filePath }
 *   );
 * }
 * ```
 */
export class FileTooLargeError extends DocumentError {
  public readonly actualSizeBytes: number;
  public readonly maxSizeBytes: number;

  constructor(
    message: string,
    actualSizeBytes: number,
    maxSizeBytes: number,
    options?: DocumentErrorOptions
  ) {
    super(message, "FILE_TOO_LARGE", options);
    this.name = "FileTooLargeError";
    this.actualSizeBytes = actualSizeBytes;
    this.maxSizeBytes = maxSizeBytes;
  }
}

/**
 * Error thrown when the parsing engine cannot provide a context,
 * e.g. the engine module failed to load or memory is exhausted.
 */
export class CreateContextError extends DocumentError {
  constructor(message: string, options?: DocumentErrorOptions) {
    super(message, "CREATE_CONTEXT_FAILED", options);
    this.name = "CreateContextError";
  }
}

/**
 * Error thrown when the engine rejects the document as malformed or unsupported.
 */
export class OpenDocumentError extends DocumentError {
  constructor(message: string, options?: DocumentErrorOptions) {
    super(message, "OPEN_DOCUMENT_FAILED", options);
    this.name = "OpenDocumentError";
  }
}

/**
 * Error thrown when a memory-backed stream over the document bytes cannot be created.
 */
export class OpenMemoryError extends DocumentError {
  constructor(message: string, options?: DocumentErrorOptions) {
    super(message, "OPEN_MEMORY_FAILED", options);
    this.name = "OpenMemoryError";
  }
}

/**
 * Error thrown when the document is encrypted and requires a password.
 *
 * The native resources allocated while opening have already been released
 * when this error reaches the caller.
 */
export class NeedsPasswordError extends DocumentError {
  constructor(message: string, options?: DocumentErrorOptions) {
    super(message, "NEEDS_PASSWORD", options);
    this.name = "NeedsPasswordError";
  }
}

/**
 * Error thrown when a page index is outside `[0, pageCount)`.
 */
export class PageMissingError extends DocumentError {
  public readonly pageIndex: number;
  public readonly pageTotal: number;

  constructor(pageIndex: number, pageTotal: number, options?: DocumentErrorOptions) {
    super(`Page ${pageIndex} is missing (document has ${pageTotal} pages)`, "PAGE_MISSING", options);
    this.name = "PageMissingError";
    this.pageIndex = pageIndex;
    this.pageTotal = pageTotal;
  }
}

/**
 * Error thrown when an object number is outside `[1, objectCount)`.
 */
export class ObjectMissingError extends DocumentError {
  public readonly objectNumber: number;
  public readonly objectTotal: number;

  constructor(objectNumber: number, objectTotal: number, options?: DocumentErrorOptions) {
    super(
      `Object ${objectNumber} is missing (valid object numbers are 1 to ${objectTotal - 1})`,
      "OBJECT_MISSING",
      options
    );
    this.name = "ObjectMissingError";
    this.objectNumber = objectNumber;
    this.objectTotal = objectTotal;
  }
}

/**
 * Error thrown when an object exists but is not an image.
 *
 * Expected while scanning every object of a document: skip the object.
 *
 * @example
 * ```typescript
 * for (let n = 1; n < document.objectCount; n++) {
 *   try {
 *     images.push(await document.extractImageBytes(n));
 *   } catch (error) {
 *     if (isNotImageError(error)) continue;
 *     throw error;
 *   }
 * }
 * ```
 */
export class NotImageError extends DocumentError {
  public readonly objectNumber: number;

  constructor(objectNumber: number, options?: DocumentErrorOptions) {
    super(`Object ${objectNumber} is not an image`, "NOT_IMAGE", options);
    this.name = "NotImageError";
    this.objectNumber = objectNumber;
  }
}

/**
 * Error thrown when the document has no outline at all.
 *
 * A present but empty outline is not an error.
 */
export class LoadOutlineError extends DocumentError {
  constructor(message: string, options?: DocumentErrorOptions) {
    super(message, "LOAD_OUTLINE_FAILED", options);
    this.name = "LoadOutlineError";
  }
}

/**
 * Error thrown when an operation is attempted on a closed document.
 */
export class DocumentClosedError extends DocumentError {
  public readonly operation: string;

  constructor(operation: string, options?: DocumentErrorOptions) {
    super(`Cannot ${operation}: document is closed`, "DOCUMENT_CLOSED", options);
    this.name = "DocumentClosedError";
    this.operation = operation;
  }
}

/**
 * Error thrown when the engine fails during an extraction.
 *
 * The engine's own error is available as `cause`.
 */
export class ExtractionError extends DocumentError {
  constructor(message: string, options?: DocumentErrorOptions) {
    super(message, "EXTRACTION_ERROR", options);
    this.name = "ExtractionError";
  }
}

/**
 * Type guard to check if an error is a DocumentError.
 *
 * @param error - The error to check
 * @returns true if the error is a DocumentError
 */
export function isDocumentError(error: unknown): error is DocumentError {
  return error instanceof DocumentError;
}

/**
 * Type guard for the skippable "object is not an image" outcome.
 */
export function isNotImageError(error: unknown): error is NotImageError {
  return error instanceof NotImageError;
}

/**
 * Normalize an unknown thrown value into an Error for cause chaining.
 *
 * @param error - Thrown value
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
