/**
 * Base error for lexnorm. The code groups failures by stage of the
 * conversion (download, validation, PDF parsing, output); the context says
 * which document and page it concerns.
 */

export enum ErrorCode {
  // Network (2xxx)
  NETWORK_TIMEOUT = 2001,
  NETWORK_CONNECTION_FAILED = 2002,
  HTTP_FETCH_FAILED = 2020,

  // Validation (4xxx)
  VALIDATION_MISSING_ARGUMENT = 4001,
  VALIDATION_PATH_NOT_FOUND = 4002,
  VALIDATION_NOT_A_PDF = 4003,
  VALIDATION_INVALID_OPTION = 4004,

  // Extraction (5xxx)
  PDF_OPEN_FAILED = 5001,
  PAGE_EXTRACTION_FAILED = 5002,

  // Storage (6xxx)
  STORAGE_WRITE_FAILED = 6001,
  STORAGE_READ_FAILED = 6002,

  UNKNOWN = 9999,
  INTERNAL = 9998,
}

export interface ErrorContext {
  operation: string;
  /** File path or URL of the PDF being converted */
  source?: string;
  url?: string;
  path?: string;
  /** 0-based */
  pageIndex?: number;
  [key: string]: unknown;
}

export class LexNormError extends Error {
  public readonly code: ErrorCode;
  public readonly context: ErrorContext;
  public readonly isRetryable: boolean;
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context: Partial<ErrorContext> = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message);
    this.name = "LexNormError";
    this.code = code;
    this.cause = options?.cause;
    this.isRetryable = options?.isRetryable ?? false;
    this.context = { ...context, operation: context.operation || "unknown" };

    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * `[Name] | Code | Op | message`, then the document, page and cause
   * where known. Pages are printed 1-based.
   */
  toLogMessage(): string {
    const parts = [
      `[${this.name}]`,
      `Code: ${this.code}`,
      `Op: ${this.context.operation}`,
      this.message,
    ];
    if (this.context.source) parts.push(`Source: ${this.context.source}`);
    if (typeof this.context.pageIndex === "number") parts.push(`Page: ${this.context.pageIndex + 1}`);
    if (this.cause) parts.push(`Cause: ${this.cause.message}`);
    return parts.join(" | ");
  }
}

/**
 * Normalize anything thrown into a LexNormError. An existing LexNormError
 * is returned as is (subclass, code and retry flag intact); the extra
 * context only fills keys it does not already have.
 */
export function wrapError(
  error: unknown,
  code: ErrorCode = ErrorCode.UNKNOWN,
  context: Partial<ErrorContext> = {}
): LexNormError {
  if (error instanceof LexNormError) {
    Object.assign(error.context, { ...context, ...error.context });
    return error;
  }

  if (error instanceof Error) {
    return new LexNormError(error.message, code, context, { cause: error });
  }

  return new LexNormError(
    typeof error === "string" ? error : "An unknown error occurred",
    code,
    context
  );
}

export function isLexNormError(error: unknown): error is LexNormError {
  return error instanceof LexNormError;
}
