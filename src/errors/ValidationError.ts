import { LexNormError, ErrorCode, type ErrorContext } from "./LexNormError";

/**
 * Error for input validation failures.
 */
export class LexNormValidationError extends LexNormError {
  public readonly field?: string;
  public readonly value?: unknown;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_INVALID_OPTION,
    context: Partial<ErrorContext> & { field?: string; value?: unknown } = {},
    options?: { cause?: Error }
  ) {
    super(message, code, context, { ...options, isRetryable: false });
    this.name = "LexNormValidationError";
    this.field = context.field;
    this.value = context.value;
  }

  static missingArgument(argument: string, context: Partial<ErrorContext> = {}) {
    return new LexNormValidationError(
      `Missing required argument: ${argument}`,
      ErrorCode.VALIDATION_MISSING_ARGUMENT,
      { ...context, field: argument }
    );
  }

  static pathNotFound(path: string, context: Partial<ErrorContext> = {}) {
    return new LexNormValidationError(
      `Path does not exist: ${path}`,
      ErrorCode.VALIDATION_PATH_NOT_FOUND,
      { ...context, field: "source", value: path, path }
    );
  }

  static notAPdf(path: string, context: Partial<ErrorContext> = {}) {
    return new LexNormValidationError(
      `File is not a PDF: ${path}`,
      ErrorCode.VALIDATION_NOT_A_PDF,
      { ...context, field: "source", value: path, path }
    );
  }

  static invalidOption(field: string, expected: string, actual: unknown, context: Partial<ErrorContext> = {}) {
    return new LexNormValidationError(
      `Invalid value for ${field}: expected ${expected}`,
      ErrorCode.VALIDATION_INVALID_OPTION,
      { ...context, field, value: actual }
    );
  }
}
