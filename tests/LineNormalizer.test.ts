import { describe, it, expect } from "vitest";
import {
  normalizeLine,
  renderLine,
  indentLevelFor,
  leadingWhitespace,
  isAssemblable,
} from "../src/normalizer/LineNormalizer";

const NONE: ReadonlySet<string> = new Set();

describe("LineNormalizer", () => {
  describe("normalizeLine", () => {
    it("marks empty and whitespace-only lines as blank", () => {
      expect(normalizeLine("", NONE)).toEqual({ kind: "blank" });
      expect(normalizeLine("   \t ", NONE)).toEqual({ kind: "blank" });
    });

    it("drops lines in the repeated set", () => {
      const repeated = new Set(["Cabeçalho repetido do processo"]);
      expect(normalizeLine("  Cabeçalho repetido do processo ", repeated)).toEqual({
        kind: "dropped",
        reason: "repeated",
      });
    });

    it("checks the repeated set before the structural exceptions", () => {
      const repeated = new Set(["1. Cláusula primeira repetida"]);
      expect(normalizeLine("1. Cláusula primeira repetida", repeated).kind).toBe("dropped");
    });

    it("drops short lines without structure", () => {
      expect(normalizeLine("Sim", NONE)).toEqual({ kind: "dropped", reason: "short" });
      expect(normalizeLine("Dois termos", NONE)).toEqual({ kind: "dropped", reason: "short" });
    });

    it("keeps short lines that are structural", () => {
      expect(normalizeLine("Art. 5", NONE)).toEqual({ kind: "kept", content: "Art. 5", indentLevel: 0 });
      expect(normalizeLine("Art 12", NONE).kind).toBe("kept");
      expect(normalizeLine("12/03/2021", NONE).kind).toBe("kept");
      expect(normalizeLine("3) Item", NONE).kind).toBe("kept");
      expect(normalizeLine("4.", NONE).kind).toBe("kept");
    });

    it("matches article references case-sensitively", () => {
      expect(normalizeLine("art. 5", NONE).kind).toBe("dropped");
    });

    it("honours a custom word threshold", () => {
      expect(normalizeLine("duas palavras", NONE, 2)).toEqual({
        kind: "kept",
        content: "duas palavras",
        indentLevel: 0,
      });
    });

    it("trims kept content and records the indent level", () => {
      expect(normalizeLine("    Texto com quatro espaços  ", NONE)).toEqual({
        kind: "kept",
        content: "Texto com quatro espaços",
        indentLevel: 1,
      });
      expect(normalizeLine("  Texto com dois espaços", NONE)).toEqual({
        kind: "kept",
        content: "Texto com dois espaços",
        indentLevel: 0,
      });
    });
  });

  describe("indentLevelFor", () => {
    it("maps leading whitespace to at most two levels", () => {
      expect(indentLevelFor(0)).toBe(0);
      expect(indentLevelFor(3)).toBe(0);
      expect(indentLevelFor(4)).toBe(1);
      expect(indentLevelFor(7)).toBe(1);
      expect(indentLevelFor(8)).toBe(2);
      expect(indentLevelFor(10)).toBe(2);
    });

    it("ignores indentation deeper than ten characters", () => {
      expect(indentLevelFor(11)).toBe(0);
      expect(indentLevelFor(40)).toBe(0);
    });
  });

  describe("leadingWhitespace", () => {
    it("counts spaces and tabs before the content", () => {
      expect(leadingWhitespace("\t  abc")).toBe(3);
      expect(leadingWhitespace("abc  ")).toBe(0);
    });
  });

  describe("renderLine", () => {
    it("renders each outcome", () => {
      expect(renderLine({ kind: "blank" })).toBe("");
      expect(renderLine({ kind: "dropped", reason: "short" })).toBeNull();
      expect(renderLine({ kind: "kept", content: "Texto", indentLevel: 0 })).toBe("Texto");
      expect(renderLine({ kind: "kept", content: "Texto", indentLevel: 2 })).toBe("    Texto");
    });
  });

  describe("isAssemblable", () => {
    it("filters out dropped lines only", () => {
      const outcomes = [
        normalizeLine("", NONE),
        normalizeLine("Sim", NONE),
        normalizeLine("Texto mantido na saída", NONE),
      ];
      expect(outcomes.filter(isAssemblable).map((o) => o.kind)).toEqual(["blank", "kept"]);
    });
  });
});
