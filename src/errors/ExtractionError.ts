import { LexNormError, ErrorCode, type ErrorContext } from "./LexNormError";

/**
 * Error for PDF parsing and page text extraction failures.
 */
export class LexNormExtractionError extends LexNormError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PAGE_EXTRACTION_FAILED,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, options);
    this.name = "LexNormExtractionError";
  }

  static openFailed(source: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new LexNormExtractionError(
      `Could not open PDF: ${source}`,
      ErrorCode.PDF_OPEN_FAILED,
      { ...context, source },
      { cause, isRetryable: false }
    );
  }

  static pageFailed(pageIndex: number, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new LexNormExtractionError(
      `Error extracting text from page ${pageIndex + 1}`,
      ErrorCode.PAGE_EXTRACTION_FAILED,
      { ...context, pageIndex },
      { cause, isRetryable: false }
    );
  }
}
