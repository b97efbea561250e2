import { LexNormError, ErrorCode, type ErrorContext } from "./LexNormError";

/**
 * Error for reading source PDFs and writing extracted documents.
 */
export class LexNormStorageError extends LexNormError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_WRITE_FAILED,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, options);
    this.name = "LexNormStorageError";
  }

  static writeFailed(path: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new LexNormStorageError(
      `Failed to write document: ${path}`,
      ErrorCode.STORAGE_WRITE_FAILED,
      { ...context, path },
      { cause, isRetryable: false }
    );
  }

  static readFailed(path: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new LexNormStorageError(
      `Error reading PDF file ${path}`,
      ErrorCode.STORAGE_READ_FAILED,
      { ...context, path },
      { cause, isRetryable: false }
    );
  }
}
