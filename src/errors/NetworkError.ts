import { LexNormError, ErrorCode, type ErrorContext } from "./LexNormError";

/**
 * Error for network-related failures while downloading a PDF.
 */
export class LexNormNetworkError extends LexNormError {
  public readonly statusCode?: number;
  public readonly endpoint?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NETWORK_CONNECTION_FAILED,
    context: Partial<ErrorContext> & { statusCode?: number; endpoint?: string } = {},
    options?: { cause?: Error; isRetryable?: boolean }
  ) {
    super(message, code, context, {
      cause: options?.cause,
      isRetryable: options?.isRetryable ?? true, // Network errors are usually retryable
    });
    this.name = "LexNormNetworkError";
    this.statusCode = context.statusCode;
    this.endpoint = context.endpoint;
  }

  static timeout(endpoint: string, timeoutMs: number, context: Partial<ErrorContext> = {}) {
    return new LexNormNetworkError(
      `Request to ${endpoint} timed out after ${timeoutMs}ms`,
      ErrorCode.NETWORK_TIMEOUT,
      { ...context, endpoint, url: endpoint },
      { isRetryable: true }
    );
  }

  static connectionFailed(endpoint: string, cause?: Error, context: Partial<ErrorContext> = {}) {
    return new LexNormNetworkError(
      `Failed to connect to ${endpoint}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      { ...context, endpoint, url: endpoint },
      { cause, isRetryable: true }
    );
  }

  /**
   * Non-2xx response. Only server-side failures are worth another attempt.
   */
  static httpStatus(endpoint: string, statusCode: number, context: Partial<ErrorContext> = {}) {
    return new LexNormNetworkError(
      `Failed to download PDF from ${endpoint}. Status code: ${statusCode}`,
      ErrorCode.HTTP_FETCH_FAILED,
      { ...context, endpoint, url: endpoint, statusCode },
      { isRetryable: statusCode >= 500 }
    );
  }
}
