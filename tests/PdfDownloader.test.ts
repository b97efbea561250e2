import { describe, it, expect, vi, afterEach } from "vitest";
import { PdfDownloader } from "../src/acquisition/PdfDownloader";
import { ErrorCode, LexNormNetworkError } from "../src/errors";

const PDF_URL = "https://example.com/autos.pdf";
const PDF_BYTES = [37, 80, 68, 70];

function pdfResponse(status = 200): Response {
  return new Response(new Uint8Array(PDF_BYTES), { status });
}

describe("PdfDownloader", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the response body", async () => {
    const fetchMock = vi.fn().mockImplementation(() => Promise.resolve(pdfResponse()));
    vi.stubGlobal("fetch", fetchMock);

    const bytes = await new PdfDownloader().download(PDF_URL);

    expect(Array.from(bytes)).toEqual(PDF_BYTES);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(PDF_URL);
  });

  it("does not retry client errors", async () => {
    const fetchMock = vi.fn().mockImplementation(() => Promise.resolve(pdfResponse(404)));
    vi.stubGlobal("fetch", fetchMock);

    const attempt = new PdfDownloader({ retry: { attempts: 3, initialDelayMs: 1 } }).download(PDF_URL);

    await expect(attempt).rejects.toBeInstanceOf(LexNormNetworkError);
    await expect(attempt).rejects.toMatchObject({ code: ErrorCode.HTTP_FETCH_FAILED, statusCode: 404 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("retries server errors", async () => {
    const fetchMock = vi.fn()
      .mockImplementationOnce(() => Promise.resolve(pdfResponse(503)))
      .mockImplementation(() => Promise.resolve(pdfResponse()));
    vi.stubGlobal("fetch", fetchMock);

    const bytes = await new PdfDownloader({ retry: { attempts: 2, initialDelayMs: 1 } }).download(PDF_URL);

    expect(Array.from(bytes)).toEqual(PDF_BYTES);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it("wraps transport failures", async () => {
    vi.stubGlobal("fetch", vi.fn().mockRejectedValue(new TypeError("fetch failed")));

    await expect(
      new PdfDownloader({ retry: { attempts: 1 } }).download(PDF_URL)
    ).rejects.toMatchObject({ code: ErrorCode.NETWORK_CONNECTION_FAILED });
  });

  it("rejects oversized bodies without retrying", async () => {
    const fetchMock = vi.fn().mockImplementation(() => Promise.resolve(pdfResponse()));
    vi.stubGlobal("fetch", fetchMock);

    await expect(
      new PdfDownloader({ maxBytes: 2, retry: { attempts: 3, initialDelayMs: 1 } }).download(PDF_URL)
    ).rejects.toMatchObject({ code: ErrorCode.HTTP_FETCH_FAILED });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
