// ─── midi-to-mida: Core Types ───────────────────────────────────────────────
//
// MIDA notation vocabulary and the structural view of a MIDA document used
// by the reader and the step view.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Notation Tokens ────────────────────────────────────────────────────────

/** Accent tokens for drum hits, loudest first. */
export const ACCENTS = {
  accented: "^|",
  normal: "*|",
  soft: "v|",
} as const;

export type AccentToken = (typeof ACCENTS)[keyof typeof ACCENTS];

/** Empty drum slot. */
export const DRUM_REST = "_";

/** Empty melodic slot. */
export const MELODIC_REST = ".";

/** Melodic slot holding the same pitches as the slot before it. */
export const SUSTAIN = "-";

/** Separator between simultaneous pitches in a melodic slot. */
export const CHORD_SEPARATOR = "~";

// ─── Document Markers ───────────────────────────────────────────────────────

export const HEADER_MARKER = "`~#";
export const QUOTE_MARKER = "‘";
export const EMPTY_DOCUMENT = "// No tracks found.";

// ─── Parsed Audicles ────────────────────────────────────────────────────────

export type DrumSlot =
  | { kind: "rest" }
  | { kind: "hits"; accents: AccentToken[] };

export type MelodicSlot =
  | { kind: "rest" }
  | { kind: "sustain" }
  | { kind: "pitches"; pitches: number[] };

export interface DrumAudicle {
  kind: "drum";
  /** 1-based line number in the source document. */
  line: number;
  /** One slot per eighth note. */
  slots: DrumSlot[];
}

export interface MelodicAudicle {
  kind: "melodic";
  line: number;
  /** One slot per sixteenth note. */
  slots: MelodicSlot[];
}

export type Audicle = DrumAudicle | MelodicAudicle;

// ─── Parse Warning ──────────────────────────────────────────────────────────

/** Warning emitted when part of a MIDA document can't be read. */
export interface ParseWarning {
  /** Where the problem occurred. */
  location: string;

  /** The offending token or line. */
  token: string;

  /** The error message. */
  message: string;
}
