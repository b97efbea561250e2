export { stripBoilerplate, BOILERPLATE_PATTERNS } from "./normalizer/BoilerplateStripper";
export { detectRepeatedExpressions } from "./normalizer/RepeatedExpressionDetector";
export {
  normalizeLine,
  renderLine,
  isAssemblable,
  type LineOutcome,
  type AssemblableLine,
  type KeptLine,
  type BlankLine,
  type DroppedLine,
  type IndentLevel,
} from "./normalizer/LineNormalizer";
export { assembleParagraphs, filterNoiseParagraphs } from "./normalizer/ParagraphAssembler";
export { countWords } from "./normalizer/structuralPatterns";
export {
  cleanPageText,
  extractPages,
  normalizePages,
  processDocument,
  type Page,
  type PageTextSource,
  type PageParagraphs,
  type DocumentResult,
  type DocumentOutcome,
  type NormalizationStats,
} from "./normalizer/PageProcessor";

export { PdfExtractor, type PdfPageSource, type PdfMetadata } from "./extraction/PdfExtractor";
export { PdfDownloader } from "./acquisition/PdfDownloader";
export { classifySource, listPdfFiles, readPdfFile } from "./acquisition/PdfSource";
export { renderDocument, writeDocument, outputPathFor } from "./output/MarkdownWriter";
export {
  convertPdf,
  convertFile,
  convertUrl,
  convertDirectory,
  convertSource,
  type ConversionResult,
  type BatchSummary,
  type SourceConversion,
  type ConverterDeps,
} from "./pipeline/convertPdf";
export { runCli } from "./cli";

export {
  DEFAULT_NORMALIZER_OPTIONS,
  resolveNormalizerOptions,
  normalizerOptionsFromEnv,
  type NormalizerOptions,
} from "./config/NormalizerOptions";
export * from "./errors";
export { logger, createLogger, type LogSink } from "./utils/logger";
