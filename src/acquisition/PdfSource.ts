/**
 * Where PDFs come from: a local file, every PDF in a directory, or a URL.
 */

import type { Stats } from "node:fs";
import { readFile, readdir, stat } from "node:fs/promises";
import path from "node:path";
import { LexNormStorageError, LexNormValidationError } from "../errors";

export type PdfSourceKind = "url" | "directory" | "file";

export interface ClassifiedSource {
  kind: PdfSourceKind;
  location: string;
}

export function isUrl(input: string): boolean {
  return input.startsWith("http");
}

export function isPdfPath(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === ".pdf";
}

/**
 * Decide how to read `input`. Local paths must exist; a single file must
 * carry a .pdf extension.
 */
export async function classifySource(input: string): Promise<ClassifiedSource> {
  const location = input.trim();
  if (!location) {
    throw LexNormValidationError.missingArgument("source", { operation: "classifySource" });
  }
  if (isUrl(location)) return { kind: "url", location };

  let info: Stats;
  try {
    info = await stat(location);
  } catch {
    throw LexNormValidationError.pathNotFound(location, { operation: "classifySource" });
  }

  if (info.isDirectory()) return { kind: "directory", location };
  if (!isPdfPath(location)) {
    throw LexNormValidationError.notAPdf(location, { operation: "classifySource" });
  }
  return { kind: "file", location };
}

/**
 * PDFs (either extension case) directly inside `directory`, sorted by name.
 */
export async function listPdfFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isPdfPath(entry.name))
    .map((entry) => path.join(directory, entry.name))
    .sort();
}

export async function readPdfFile(filePath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(filePath));
  } catch (err) {
    throw LexNormStorageError.readFailed(
      filePath,
      err instanceof Error ? err : undefined,
      { operation: "readPdfFile" }
    );
  }
}
