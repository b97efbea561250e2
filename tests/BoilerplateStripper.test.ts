import { describe, it, expect } from "vitest";
import { stripBoilerplate, BOILERPLATE_PATTERNS } from "../src/normalizer/BoilerplateStripper";

describe("BoilerplateStripper", () => {
  it("has the patterns in a fixed order", () => {
    expect(BOILERPLATE_PATTERNS).toHaveLength(11);
  });

  it("returns text without boilerplate unchanged", () => {
    const text = "O réu foi citado.\n\n    1. Primeira condição.";
    expect(stripBoilerplate(text)).toBe(text);
  });

  it("removes the digital signature attestation but keeps the line break", () => {
    const text =
      "Este documento é cópia do original, assinado digitalmente por Fulano de Tal, protocolado em 01/02/2023.\nTexto";
    expect(stripBoilerplate(text)).toBe("\nTexto");
  });

  it("removes the e-SAJ verification footer", () => {
    const text =
      "Texto\nPara conferir o original, acesse o site https://esaj.tjsp.jus.br/pastadigital/abrirConferencia, informe o processo 1000.\nMais";
    expect(stripBoilerplate(text)).toBe("Texto\n\nMais");
  });

  it("removes page counters anywhere in a line", () => {
    expect(stripBoilerplate("Texto Página 3 de 12 fim")).toBe("Texto  fim");
    expect(stripBoilerplate("fls. PÁGINA 3 DE 12")).toBe("fls. ");
  });

  it("removes case numbers with their separators", () => {
    expect(stripBoilerplate("Processo nº 1001234-56.2023.8.26.0100 - Ação")).toBe(" - Ação");
  });

  it("removes court and jurisdiction header lines", () => {
    const text = [
      "TRIBUNAL DE JUSTIÇA DO ESTADO DE SÃO PAULO",
      "COMARCA DE SÃO PAULO",
      "FORO CENTRAL CÍVEL",
      "Sentença proferida nos autos.",
    ].join("\n");
    expect(stripBoilerplate(text)).toBe("Sentença proferida nos autos.");
  });

  it("matches headers case-insensitively", () => {
    expect(stripBoilerplate("Poder Judiciário\nTexto")).toBe("Texto");
  });

  it("removes the signature-law notice", () => {
    expect(
      stripBoilerplate("DOCUMENTO ASSINADO DIGITALMENTE NOS TERMOS DA LEI 11.419/2006\nTexto")
    ).toBe("Texto");
  });

  it("only strips headers at the start of a line", () => {
    const text = "O TRIBUNAL decidiu por unanimidade.\n";
    expect(stripBoilerplate(text)).toBe(text);
  });

  it("leaves a header on the last line without a trailing break", () => {
    expect(stripBoilerplate("Texto\nFORO CENTRAL")).toBe("Texto\nFORO CENTRAL");
  });

  it("removes a CRLF-terminated header together with its line ending", () => {
    expect(stripBoilerplate("aqui\r\nTRIBUNAL DE JUSTIÇA DE SÃO PAULO\r\ncontinua")).toBe(
      "aqui\r\ncontinua"
    );
  });

  it("accepts a custom pattern list", () => {
    expect(stripBoilerplate("abc 123", [/\d+/g])).toBe("abc ");
  });
});
