/**
 * Conversion driver: acquire bytes → open the PDF → normalize → write.
 *
 * Documents are converted one after another. Each one gets its own
 * repeated-expression set; nothing carries over between documents.
 */

import path from "node:path";
import { OUTPUT_DEFAULTS } from "../config/constants";
import type { NormalizerOptions } from "../config/NormalizerOptions";
import { classifySource, listPdfFiles, readPdfFile, type PdfSourceKind } from "../acquisition/PdfSource";
import { PdfDownloader } from "../acquisition/PdfDownloader";
import { ErrorCode, wrapError, type LexNormError } from "../errors";
import { PdfExtractor, type PdfPageSource } from "../extraction/PdfExtractor";
import { processDocument, type NormalizationStats } from "../normalizer/PageProcessor";
import { outputPathFor, writeDocument } from "../output/MarkdownWriter";
import { createLogger, type LogSink } from "../utils/logger";

export interface PdfOpener {
  open(bytes: Uint8Array, source: string): Promise<PdfPageSource>;
}

export interface PdfFetcher {
  download(url: string): Promise<Uint8Array>;
}

export interface ConverterDeps {
  extractor?: PdfOpener;
  downloader?: PdfFetcher;
  options?: Partial<NormalizerOptions>;
  /**
   * Where a single file or a URL download is written; defaults to the
   * cwd. Directory batches always write beside each PDF.
   */
  outputDir?: string;
  log?: LogSink;
}

export interface ConversionResult {
  ok: boolean;
  source: string;
  outputPath: string;
  stats?: NormalizationStats;
  error?: LexNormError;
}

export interface BatchSummary {
  successful: number;
  failed: number;
  total: number;
  results: ConversionResult[];
}

export interface SourceConversion extends BatchSummary {
  kind: PdfSourceKind;
}

function loggerFor(deps: ConverterDeps, source: string): LogSink {
  return deps.log ?? createLogger({ source: path.basename(source) });
}

// A failed release must not turn a finished conversion into a rejection.
async function closePdf(pdf: PdfPageSource, source: string, log: LogSink): Promise<void> {
  try {
    await pdf.close();
  } catch (err) {
    const error = wrapError(err, ErrorCode.INTERNAL, { operation: "closePdf", source });
    log.warn(`Could not release PDF: ${error.message}`, {}, error);
  }
}

function summarize(results: ConversionResult[]): BatchSummary {
  const successful = results.filter((r) => r.ok).length;
  return { successful, failed: results.length - successful, total: results.length, results };
}

/**
 * Convert one PDF held in memory. Never throws: failures come back as
 * `ok: false` with the error attached.
 */
export async function convertPdf(
  bytes: Uint8Array,
  source: string,
  outputPath: string,
  deps: ConverterDeps = {}
): Promise<ConversionResult> {
  const log = loggerFor(deps, source);
  const extractor = deps.extractor ?? new PdfExtractor();

  let pdf: PdfPageSource;
  try {
    pdf = await extractor.open(bytes, source);
  } catch (err) {
    const error = wrapError(err, ErrorCode.PDF_OPEN_FAILED, { operation: "convertPdf", source });
    log.error(`Error processing PDF: ${error.message}`, {}, error);
    return { ok: false, source, outputPath, error };
  }

  try {
    const outcome = await processDocument(pdf, deps.options, log);
    if (!outcome.ok) {
      return { ok: false, source, outputPath, stats: outcome.stats };
    }

    await writeDocument(outcome.result, outputPath, pdf.metadata.title);
    log.info(`Text successfully extracted and saved to '${outputPath}'`);
    log.info(
      `Summary: ${outcome.stats.processedPages} pages processed, ` +
        `${outcome.stats.totalParagraphs} paragraphs extracted`
    );
    return { ok: true, source, outputPath, stats: outcome.stats };
  } catch (err) {
    const error = wrapError(err, ErrorCode.INTERNAL, { operation: "convertPdf", source });
    log.error(`Error processing PDF: ${error.message}`, {}, error);
    return { ok: false, source, outputPath, error };
  } finally {
    await closePdf(pdf, source, log);
  }
}

export async function convertFile(
  filePath: string,
  deps: ConverterDeps = {},
  outputPath: string = outputPathFor(filePath, deps.outputDir ?? process.cwd())
): Promise<ConversionResult> {
  let bytes: Uint8Array;
  try {
    bytes = await readPdfFile(filePath);
  } catch (err) {
    const error = wrapError(err, ErrorCode.STORAGE_READ_FAILED, { operation: "convertFile", path: filePath });
    loggerFor(deps, filePath).error(error.message, {}, error);
    return { ok: false, source: filePath, outputPath, error };
  }
  return convertPdf(bytes, filePath, outputPath, deps);
}

export async function convertUrl(url: string, deps: ConverterDeps = {}): Promise<ConversionResult> {
  const outputPath = path.join(
    deps.outputDir ?? process.cwd(),
    `${OUTPUT_DEFAULTS.URL_BASENAME}${OUTPUT_DEFAULTS.EXTENSION}`
  );
  const log = loggerFor(deps, url);
  const downloader = deps.downloader ?? new PdfDownloader();

  log.info(`Downloading PDF from ${url}...`);
  let bytes: Uint8Array;
  try {
    bytes = await downloader.download(url);
  } catch (err) {
    const error = wrapError(err, ErrorCode.HTTP_FETCH_FAILED, { operation: "convertUrl", url });
    log.error(`Error downloading PDF: ${error.message}`, {}, error);
    return { ok: false, source: url, outputPath, error };
  }
  return convertPdf(bytes, url, outputPath, deps);
}

/**
 * Convert every PDF directly inside `directory`; outputs land beside them.
 */
export async function convertDirectory(directory: string, deps: ConverterDeps = {}): Promise<BatchSummary> {
  const log = deps.log ?? createLogger({ directory });
  const files = await listPdfFiles(directory);

  if (files.length === 0) {
    log.warn(`No PDF files found in directory: ${directory}`);
    return summarize([]);
  }

  log.info(`Found ${files.length} PDF file(s) in directory: ${directory}`);

  const results: ConversionResult[] = [];
  for (const file of files) {
    log.info(`Processing: ${path.basename(file)}`);
    results.push(await convertFile(file, deps, outputPathFor(file)));
  }

  const summary = summarize(results);
  log.info("Conversion summary", {
    successful: summary.successful,
    failed: summary.failed,
    total: summary.total,
  });
  return summary;
}

/**
 * Entry point for a single CLI argument: a PDF file, a directory or a URL.
 * Throws LexNormValidationError when the argument names nothing usable.
 */
export async function convertSource(input: string, deps: ConverterDeps = {}): Promise<SourceConversion> {
  const { kind, location } = await classifySource(input);
  switch (kind) {
    case "url":
      return { kind, ...summarize([await convertUrl(location, deps)]) };
    case "directory":
      return { kind, ...(await convertDirectory(location, deps)) };
    case "file":
      return { kind, ...summarize([await convertFile(location, deps)]) };
  }
}
