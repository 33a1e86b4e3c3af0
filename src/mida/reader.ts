// ─── MIDA Document Reader ────────────────────────────────────────────────────
//
// Reads a MIDA document back into drum and melodic audicles. Comment lines
// (starting with "/") and envelope markers are skipped; anything that can't
// be read is reported as a ParseWarning instead of throwing.
// ─────────────────────────────────────────────────────────────────────────────

import {
  ACCENTS,
  CHORD_SEPARATOR,
  DRUM_REST,
  HEADER_MARKER,
  MELODIC_REST,
  QUOTE_MARKER,
  SUSTAIN,
  type AccentToken,
  type Audicle,
  type DrumAudicle,
  type DrumSlot,
  type MelodicAudicle,
  type MelodicSlot,
  type ParseWarning,
} from "../types.js";
import { safeParsePitchName } from "../note-parser.js";

/** Result of reading a MIDA document. */
export interface MidaReadResult {
  audicles: Audicle[];
  warnings: ParseWarning[];
}

const ACCENT_TOKENS: readonly string[] = Object.values(ACCENTS);

function isAccent(token: string): token is AccentToken {
  return ACCENT_TOKENS.includes(token);
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Parse a MIDA document into audicles, in document order.
 */
export function parseMidaDocument(text: string): MidaReadResult {
  const audicles: Audicle[] = [];
  const warnings: ParseWarning[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const lineNumber = index + 1;
    const line = raw.trim();

    if (line === "" || line.startsWith("/")) return;
    if (line === HEADER_MARKER || line === QUOTE_MARKER) return;

    if (line.length >= 2 && line.startsWith("*") && line.endsWith("*")) {
      audicles.push(parseMelodicAudicle(line, lineNumber, warnings));
    } else if (line.startsWith("(") && line.endsWith(")")) {
      audicles.push(parseDrumAudicle(line, lineNumber, warnings));
    } else {
      warnings.push({
        location: `line ${lineNumber}`,
        token: line,
        message: "Unrecognized line (expected *…* or (…))",
      });
    }
  });

  return { audicles, warnings };
}

/**
 * Parse a melodic audicle line such as "*C4~E4 - . G4*".
 */
export function parseMelodicAudicle(
  line: string,
  lineNumber: number,
  warnings: ParseWarning[],
): MelodicAudicle {
  const body = line.slice(1, -1);
  const slots: MelodicSlot[] = [];
  let sounding = false;

  for (const token of body.split(" ").map(t => t.trim())) {
    if (token === "" || token === "|") continue;

    if (token === MELODIC_REST) {
      slots.push({ kind: "rest" });
      sounding = false;
    } else if (token === SUSTAIN) {
      slots.push(sounding ? { kind: "sustain" } : { kind: "rest" });
    } else {
      const location = `line ${lineNumber} slot ${slots.length + 1}`;
      const pitches: number[] = [];
      for (const name of token.split(CHORD_SEPARATOR)) {
        const pitch = safeParsePitchName(name, location, warnings);
        if (pitch !== null) pitches.push(pitch);
      }
      sounding = pitches.length > 0;
      slots.push(sounding ? { kind: "pitches", pitches } : { kind: "rest" });
    }
  }

  return { kind: "melodic", line: lineNumber, slots };
}

/**
 * Parse a drum audicle line such as "(^| _ {*| v|})".
 */
export function parseDrumAudicle(
  line: string,
  lineNumber: number,
  warnings: ParseWarning[],
): DrumAudicle {
  const body = line.slice(1, -1);
  const slots: DrumSlot[] = [];
  const location = (): string => `line ${lineNumber} slot ${slots.length + 1}`;

  const pushToken = (token: string): void => {
    if (token === DRUM_REST) {
      slots.push({ kind: "rest" });
    } else if (isAccent(token)) {
      slots.push({ kind: "hits", accents: [token] });
    } else {
      warnings.push({ location: location(), token, message: `Unknown drum token: "${token}"` });
      slots.push({ kind: "rest" });
    }
  };

  const pushGroup = (content: string): void => {
    const accents: AccentToken[] = [];
    for (const token of content.split(" ").filter(t => t !== "")) {
      if (isAccent(token)) {
        accents.push(token);
      } else {
        warnings.push({ location: location(), token, message: `Unknown drum token in group: "${token}"` });
      }
    }
    slots.push(accents.length > 0 ? { kind: "hits", accents } : { kind: "rest" });
  };

  let token = "";
  let group: string | null = null;

  for (const ch of body) {
    if (group !== null) {
      if (ch === "}") {
        pushGroup(group);
        group = null;
      } else {
        group += ch;
      }
    } else if (ch === "{") {
      if (token !== "") {
        pushToken(token);
        token = "";
      }
      group = "";
    } else if (/\s/.test(ch)) {
      if (token !== "") {
        pushToken(token);
        token = "";
      }
    } else {
      token += ch;
    }
  }

  if (token !== "") pushToken(token);
  if (group !== null) {
    warnings.push({ location: location(), token: `{${group}`, message: "Unterminated hit group" });
    pushGroup(group);
  }

  return { kind: "drum", line: lineNumber, slots };
}
