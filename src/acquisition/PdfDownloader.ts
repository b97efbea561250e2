import { HTTP_DEFAULTS } from "../config/constants";
import { ErrorCode, LexNormNetworkError } from "../errors";
import { DOWNLOAD_RETRY_POLICY, withRetry, type RetryPolicy } from "../utils/retry";

export interface PdfDownloaderOptions {
  timeoutMs?: number;
  userAgent?: string;
  maxBytes?: number;
  retry?: Partial<RetryPolicy>;
}

/**
 * PdfDownloader
 * - GET with a timeout and a user agent, following redirects.
 * - Non-2xx responses become LexNormNetworkError; 5xx and transport
 *   failures are retried with backoff.
 */
export class PdfDownloader {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly maxBytes: number;
  private readonly retry: Partial<RetryPolicy>;

  constructor(opts: PdfDownloaderOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? HTTP_DEFAULTS.TIMEOUT_MS;
    this.userAgent = opts.userAgent ?? HTTP_DEFAULTS.USER_AGENT;
    this.maxBytes = opts.maxBytes ?? HTTP_DEFAULTS.MAX_CONTENT_BYTES;
    this.retry = opts.retry ?? DOWNLOAD_RETRY_POLICY;
  }

  private async withTimeout<T>(url: string, fn: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await fn(controller.signal);
    } catch (err) {
      if (controller.signal.aborted) {
        throw LexNormNetworkError.timeout(url, this.timeoutMs, { operation: "download" });
      }
      if (err instanceof LexNormNetworkError) throw err;
      throw LexNormNetworkError.connectionFailed(
        url,
        err instanceof Error ? err : undefined,
        { operation: "download" }
      );
    } finally {
      clearTimeout(t);
    }
  }

  private async fetchOnce(url: string): Promise<Uint8Array> {
    return this.withTimeout(url, async (signal) => {
      const res = await fetch(url, {
        method: "GET",
        headers: { "user-agent": this.userAgent, accept: "application/pdf, */*;q=0.1" },
        signal,
        redirect: "follow",
      });
      if (!res.ok) {
        throw LexNormNetworkError.httpStatus(url, res.status, { operation: "download" });
      }

      const body = new Uint8Array(await res.arrayBuffer());
      if (body.byteLength > this.maxBytes) {
        throw new LexNormNetworkError(
          `Response from ${url} exceeds ${this.maxBytes} bytes`,
          ErrorCode.HTTP_FETCH_FAILED,
          { operation: "download", endpoint: url, url },
          { isRetryable: false }
        );
      }
      return body;
    });
  }

  async download(url: string): Promise<Uint8Array> {
    return withRetry(() => this.fetchOnce(url), this.retry, `Download ${url}`);
  }
}
