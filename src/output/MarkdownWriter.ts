/**
 * MarkdownWriter: serializes a DocumentResult: one heading per page that
 * kept content, one block per paragraph.
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { OUTPUT_DEFAULTS } from "../config/constants";
import { LexNormStorageError } from "../errors";
import type { DocumentResult } from "../normalizer/PageProcessor";

export function renderDocument(result: DocumentResult, title?: string): string {
  const blocks: string[] = [];
  if (title) blocks.push(`# ${title}`);

  for (const page of result) {
    blocks.push(`${OUTPUT_DEFAULTS.PAGE_HEADING} ${page.pageIndex + 1}`);
    for (const paragraph of page.paragraphs) {
      if (paragraph.trim()) blocks.push(paragraph);
    }
  }

  return blocks.join("\n\n") + "\n";
}

/**
 * `<outputDir>/<base>_extracted.md`; by default next to the source PDF.
 */
export function outputPathFor(pdfPath: string, outputDir: string = path.dirname(pdfPath)): string {
  const { name } = path.parse(pdfPath);
  return path.join(outputDir, `${name}${OUTPUT_DEFAULTS.SUFFIX}${OUTPUT_DEFAULTS.EXTENSION}`);
}

/**
 * Write the rendered document. An empty result writes nothing and
 * returns false.
 */
export async function writeDocument(
  result: DocumentResult,
  outputPath: string,
  title?: string
): Promise<boolean> {
  if (result.length === 0) return false;

  try {
    await mkdir(path.dirname(outputPath), { recursive: true });
    await writeFile(outputPath, renderDocument(result, title), "utf8");
  } catch (err) {
    throw LexNormStorageError.writeFailed(
      outputPath,
      err instanceof Error ? err : undefined,
      { operation: "writeDocument" }
    );
  }
  return true;
}
