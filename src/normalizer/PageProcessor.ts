/**
 * PageProcessor: two-pass normalization of one document.
 *
 * Pass 1 builds a document-wide set of repeated lines from every page that
 * produced text. Pass 2 cleans each page against that set. The set is
 * scoped to a single document and never reused for another.
 */

import { NORMALIZER_DEFAULTS } from "../config/constants";
import { resolveNormalizerOptions, type NormalizerOptions } from "../config/NormalizerOptions";
import { LexNormExtractionError } from "../errors";
import { logger, type LogSink } from "../utils/logger";
import { stripBoilerplate } from "./BoilerplateStripper";
import { detectRepeatedExpressions } from "./RepeatedExpressionDetector";
import { isAssemblable, normalizeLine } from "./LineNormalizer";
import { assembleParagraphs } from "./ParagraphAssembler";

/** Raw text of one page; "" when extraction failed or the page is blank */
export interface Page {
  readonly index: number;
  readonly rawText: string;
}

/** Anything that can hand over page texts one at a time (a parsed PDF, a fake) */
export interface PageTextSource {
  readonly pageCount: number;
  extractPageText(pageIndex: number): Promise<string>;
}

export interface PageParagraphs {
  readonly pageIndex: number;
  readonly paragraphs: readonly string[];
}

/** Pages in input order, only those that kept at least one paragraph */
export type DocumentResult = readonly PageParagraphs[];

export interface NormalizationStats {
  pageCount: number;
  failedPages: number[];
  repeatedExpressionCount: number;
  processedPages: number;
  totalParagraphs: number;
}

export type DocumentOutcome =
  | { ok: true; result: DocumentResult; stats: NormalizationStats }
  | { ok: false; reason: "empty-document"; stats: NormalizationStats };

export interface CleanPageOptions {
  /** Document-wide repeated lines; detected from the page itself when absent */
  repeated?: ReadonlySet<string>;
  minWordThreshold?: number;
  pageRepeatThreshold?: number;
}

/**
 * Clean a single page of text into paragraphs.
 */
export function cleanPageText(text: string, options: CleanPageOptions = {}): string[] {
  if (!text) return [];

  const lines = stripBoilerplate(text).split("\n");
  const repeated =
    options.repeated ??
    detectRepeatedExpressions(
      lines,
      options.pageRepeatThreshold ?? NORMALIZER_DEFAULTS.PAGE_REPEAT_THRESHOLD
    );
  const minWords = options.minWordThreshold ?? NORMALIZER_DEFAULTS.MIN_WORD_THRESHOLD;

  const kept = lines
    .map((line) => normalizeLine(line, repeated, minWords))
    .filter(isAssemblable);

  return assembleParagraphs(kept);
}

/**
 * Pull text out of every page, in order. A page that throws or yields only
 * whitespace becomes an empty page; the document carries on.
 */
export async function extractPages(
  source: PageTextSource,
  log: LogSink = logger
): Promise<Page[]> {
  const pages: Page[] = [];

  for (let index = 0; index < source.pageCount; index++) {
    let rawText = "";
    try {
      const text = await source.extractPageText(index);
      if (text.trim()) {
        rawText = text;
      } else {
        log.warn(`Page ${index + 1} appears to be empty or contains no extractable text`, {
          pageIndex: index,
        });
      }
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      const failure = LexNormExtractionError.pageFailed(index, cause, { operation: "extractPages" });
      log.warn(failure.toLogMessage(), { pageIndex: index }, failure);
    }
    pages.push({ index, rawText });
  }

  return pages;
}

export function normalizePages(
  pages: readonly Page[],
  options: Partial<NormalizerOptions> = {},
  log: LogSink = logger
): DocumentOutcome {
  const opts = resolveNormalizerOptions(options);

  const withText = pages.filter((page) => page.rawText);
  const corpus = withText.map((page) => page.rawText).join("\n").split("\n");
  const repeated = detectRepeatedExpressions(corpus, opts.documentRepeatThreshold);
  log.info(`Detected ${repeated.size} repeated expressions to remove`);

  const result: PageParagraphs[] = [];
  let totalParagraphs = 0;

  for (const page of withText) {
    const paragraphs = cleanPageText(page.rawText, {
      repeated,
      minWordThreshold: opts.minWordThreshold,
    });

    if (paragraphs.length > 0) {
      result.push({ pageIndex: page.index, paragraphs });
      totalParagraphs += paragraphs.length;
      log.debug(`Processed page ${page.index + 1}: ${paragraphs.length} paragraphs extracted`);
    } else {
      log.debug(`Page ${page.index + 1}: No content after cleaning`);
    }
  }

  const stats: NormalizationStats = {
    pageCount: pages.length,
    failedPages: pages.filter((page) => !page.rawText).map((page) => page.index),
    repeatedExpressionCount: repeated.size,
    processedPages: result.length,
    totalParagraphs,
  };

  if (result.length === 0) {
    log.warn("No content was extracted from any page", { pageCount: pages.length });
    return { ok: false, reason: "empty-document", stats };
  }

  return { ok: true, result, stats };
}

/**
 * Extract and normalize a whole document.
 */
export async function processDocument(
  source: PageTextSource,
  options: Partial<NormalizerOptions> = {},
  log: LogSink = logger
): Promise<DocumentOutcome> {
  const pages = await extractPages(source, log);
  return normalizePages(pages, options, log);
}
