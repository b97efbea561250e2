import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, access } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { outputPathFor, renderDocument, writeDocument } from "../src/output/MarkdownWriter";
import type { DocumentResult } from "../src/normalizer/PageProcessor";

const RESULT: DocumentResult = [
  { pageIndex: 0, paragraphs: ["A b c.", "D e f."] },
  { pageIndex: 2, paragraphs: ["G h i."] },
];

describe("MarkdownWriter", () => {
  describe("renderDocument", () => {
    it("emits one heading per page and one block per paragraph", () => {
      expect(renderDocument(RESULT)).toBe(
        "## Page 1\n\nA b c.\n\nD e f.\n\n## Page 3\n\nG h i.\n"
      );
    });

    it("puts the title first when given", () => {
      expect(renderDocument([{ pageIndex: 0, paragraphs: ["A b c."] }], "Sentença")).toBe(
        "# Sentença\n\n## Page 1\n\nA b c.\n"
      );
    });
  });

  describe("outputPathFor", () => {
    it("places the output next to the PDF", () => {
      expect(outputPathFor(path.join("/tmp", "autos", "caso.pdf"))).toBe(
        path.join("/tmp", "autos", "caso_extracted.md")
      );
    });

    it("places the output in the given directory", () => {
      expect(outputPathFor(path.join("/tmp", "autos", "caso.PDF"), "/out")).toBe(
        path.join("/out", "caso_extracted.md")
      );
    });
  });

  describe("writeDocument", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(path.join(os.tmpdir(), "lexnorm-writer-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("writes the rendered document", async () => {
      const target = path.join(dir, "out", "caso_extracted.md");

      await expect(writeDocument(RESULT, target)).resolves.toBe(true);
      expect(await readFile(target, "utf8")).toBe(renderDocument(RESULT));
    });

    it("skips an empty result", async () => {
      const target = path.join(dir, "vazio_extracted.md");

      await expect(writeDocument([], target)).resolves.toBe(false);
      await expect(access(target)).rejects.toThrow();
    });
  });
});
