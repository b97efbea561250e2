import { normalizerOptionsFromEnv } from "./config/NormalizerOptions";
import { isLexNormError } from "./errors";
import { convertSource, type ConverterDeps } from "./pipeline/convertPdf";

export const USAGE = `Legal PDF text extractor with boilerplate cleaning

Usage:
  lexnorm <pdf_url_or_file_path_or_directory>

Features:
- Removes repeated headers/footers across pages
- Removes legal document footers (e-SAJ links, digital signatures)
- Preserves paragraph structure and indented items
- Handles single files, directories, or URLs

Examples:
- Single file: lexnorm document.pdf
- Directory:   lexnorm /path/to/pdf/directory
- URL:         lexnorm https://example.com/document.pdf`;

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

/**
 * Run the extractor for the given arguments (without node/script) and
 * return the process exit code. Normalizer options come from
 * LEXNORM_MIN_WORDS and LEXNORM_REPEAT_THRESHOLD unless `deps` sets them.
 *
 * Exit 0 when at least one document was written, or when a directory
 * simply held no PDFs; 1 otherwise.
 */
export async function runCli(
  args: readonly string[],
  deps: ConverterDeps = {},
  io: CliIo = consoleIo,
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  if (args.length !== 1) {
    io.err(USAGE);
    return 1;
  }

  try {
    const options = deps.options ?? normalizerOptionsFromEnv(env);
    const summary = await convertSource(args[0], { ...deps, options });
    if (summary.kind === "directory") {
      if (summary.total === 0) return 0;
      io.out("--- Conversion Summary ---");
      io.out(`Successful conversions: ${summary.successful}`);
      io.out(`Failed conversions: ${summary.failed}`);
      io.out(`Total files processed: ${summary.total}`);
    }
    return summary.successful > 0 ? 0 : 1;
  } catch (err) {
    if (isLexNormError(err)) {
      io.err(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
