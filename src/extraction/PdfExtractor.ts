/**
 * PdfExtractor: PDF to per-page text via unpdf.
 * No layout reconstruction (positions are ignored); the text items of a
 * page are concatenated and a line break is emitted wherever pdf.js marks
 * the end of a line.
 */

import { getDocumentProxy } from "unpdf";
import { LexNormExtractionError } from "../errors";
import type { PageTextSource } from "../normalizer/PageProcessor";
import { logger } from "../utils/logger";

type PdfDocument = Awaited<ReturnType<typeof getDocumentProxy>>;

export interface PdfMetadata {
  title?: string;
  author?: string;
  subject?: string;
}

export interface PdfPageSource extends PageTextSource {
  readonly metadata: PdfMetadata;
  close(): Promise<void>;
}

function readInfoField(info: unknown, key: string): string | undefined {
  if (typeof info !== "object" || info === null) return undefined;
  const value: unknown = Reflect.get(info, key);
  return typeof value === "string" && value ? value : undefined;
}

class UnpdfPageSource implements PdfPageSource {
  constructor(
    private readonly doc: PdfDocument,
    readonly metadata: PdfMetadata
  ) {}

  get pageCount(): number {
    return this.doc.numPages;
  }

  async extractPageText(pageIndex: number): Promise<string> {
    // pdf.js pages are 1-based
    const page = await this.doc.getPage(pageIndex + 1);
    const content = await page.getTextContent();

    let text = "";
    for (const item of content.items) {
      if (!("str" in item)) continue;
      text += item.str;
      if (item.hasEOL) text += "\n";
    }
    return text;
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }
}

export class PdfExtractor {
  async open(buffer: Buffer | Uint8Array, source = "<buffer>"): Promise<PdfPageSource> {
    // pdf.js takes ownership of the array it is handed, so give it a copy
    const data = new Uint8Array(buffer);

    let doc: PdfDocument;
    try {
      doc = await getDocumentProxy(data);
    } catch (err) {
      throw LexNormExtractionError.openFailed(
        source,
        err instanceof Error ? err : undefined,
        { operation: "PdfExtractor.open" }
      );
    }

    let metadata: PdfMetadata = {};
    try {
      const { info } = await doc.getMetadata();
      metadata = {
        title: readInfoField(info, "Title"),
        author: readInfoField(info, "Author"),
        subject: readInfoField(info, "Subject"),
      };
    } catch (err) {
      // metadata extraction is best-effort
      logger.debug("PDF metadata unavailable", {
        source,
        reason: err instanceof Error ? err.message : String(err),
      });
    }

    return new UnpdfPageSource(doc, metadata);
  }
}
