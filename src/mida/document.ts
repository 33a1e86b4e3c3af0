// ─── Document Assembly ───────────────────────────────────────────────────────
//
// Joins drum and melodic audicles into one MIDA document. Two or more
// audicles get the header/quote envelope; a single audicle stands alone.
// ─────────────────────────────────────────────────────────────────────────────

import { EMPTY_DOCUMENT, HEADER_MARKER, QUOTE_MARKER } from "../types.js";

/** Default preview size, in characters. */
export const DEFAULT_PREVIEW_LENGTH = 500;

/**
 * Assemble the document.
 *
 * Drum audicles always go first. With exactly one audicle overall, that
 * audicle is appended after them, so a lone drum audicle is written twice.
 */
export function assembleDocument(
  drumAudicles: readonly string[],
  melodicAudicles: readonly string[],
): string {
  const total = drumAudicles.length + melodicAudicles.length;
  const output: string[] = [...drumAudicles];

  if (total === 0) {
    return EMPTY_DOCUMENT;
  }

  if (total === 1) {
    output.push(melodicAudicles.length > 0 ? melodicAudicles[0] : drumAudicles[0]);
    return output.join("\n");
  }

  output.unshift(HEADER_MARKER, QUOTE_MARKER);
  output.push(...melodicAudicles, QUOTE_MARKER);
  return output.join("\n");
}

/**
 * First `limit` characters of a document, with "..." appended when cut.
 */
export function previewDocument(document: string, limit: number = DEFAULT_PREVIEW_LENGTH): string {
  return document.length > limit ? `${document.slice(0, limit)}...` : document;
}
