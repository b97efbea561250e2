/**
 * BoilerplateStripper: removes artifacts that court portals stamp onto
 * every page of an exported case file: e-SAJ verification footers,
 * digital-signature notices, page counters, case numbers and the
 * court/jurisdiction header block.
 *
 * Patterns are applied in order, each independently. Anchored patterns
 * only match at a line start and consume the line break after them.
 * "Rest of the line" is `[^\n]*`, so a CR of a CRLF ending is consumed
 * with the line.
 */

export const BOILERPLATE_PATTERNS: readonly RegExp[] = [
  // e-SAJ verification footer
  /Para conferir o original, acesse o site https:\/\/esaj\.tjsp\.jus\.br\/[^\n]*/gim,
  // Digital signature attestation
  /Este documento é cópia do original, assinado digitalmente por [^\n]*/gim,
  // Variations of the two above
  /Para conferir[^\n]*?https:\/\/esaj\.tjsp\.jus\.br[^\n]*/gim,
  /Este documento[^\n]*?assinado digitalmente[^\n]*?[\n\r]/gim,
  // Page counters and case numbers
  /Página \d+ de \d+/gim,
  /Processo n[°º]?\s*\d+[\d.\-/]*/gim,
  // Court and jurisdiction headers
  /^TRIBUNAL[^\n]*[\n\r]/gim,
  /^PODER JUDICIÁRIO[^\n]*[\n\r]/gim,
  /^COMARCA DE[^\n]*[\n\r]/gim,
  /^FORO[^\n]*[\n\r]/gim,
  /DOCUMENTO ASSINADO DIGITALMENTE NOS TERMOS DA LEI[^\n]*[\n\r]/gim,
];

export function stripBoilerplate(
  text: string,
  patterns: readonly RegExp[] = BOILERPLATE_PATTERNS
): string {
  let stripped = text;
  for (const pattern of patterns) {
    stripped = stripped.replace(pattern, "");
  }
  return stripped;
}
