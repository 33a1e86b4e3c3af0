// ─── midi-to-mida: Pitch Names ───────────────────────────────────────────────
//
// Converts MIDI note numbers to scientific pitch names ("C4", "F#5", "C-1")
// and back. MIDA writes sharps only; the parser also takes flats.
// ─────────────────────────────────────────────────────────────────────────────

import type { ParseWarning } from "./types.js";

const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

const NOTE_OFFSETS: Record<string, number> = {
  C: 0, D: 2, E: 4, F: 5, G: 7, A: 9, B: 11,
};

/**
 * Convert a MIDI note number (0–127) to a pitch name.
 *
 * 60 → "C4", 69 → "A4", 0 → "C-1"
 */
export function pitchName(pitch: number): string {
  const octave = Math.floor(pitch / 12) - 1;
  return `${NOTE_NAMES[pitch % 12]}${octave}`;
}

/**
 * Parse a pitch name into a MIDI note number.
 *
 * Examples:
 *   "C4"  → 60
 *   "A4"  → 69
 *   "F#5" → 78
 *   "Bb3" → 58
 *   "C-1" → 0
 */
export function parsePitchName(name: string): number {
  const trimmed = name.trim();

  const match = trimmed.match(/^([A-Ga-g])(#|b)?(-?\d+)$/);
  if (!match) {
    throw new Error(`Invalid pitch: "${name}"`);
  }

  const [, letter, accidental, octaveStr] = match;
  const base = NOTE_OFFSETS[letter.toUpperCase()];
  if (base === undefined) {
    throw new Error(`Unknown note letter: "${letter}"`);
  }

  let pitch = (parseInt(octaveStr, 10) + 1) * 12 + base;
  if (accidental === "#") pitch += 1;
  if (accidental === "b") pitch -= 1;

  if (pitch < 0 || pitch > 127) {
    throw new Error(`MIDI note out of range: ${pitch} (from "${name}")`);
  }

  return pitch;
}

/**
 * Safely parse a pitch name — returns null on error instead of throwing.
 * Collects a warning in the provided array when parsing fails.
 */
export function safeParsePitchName(
  name: string,
  location: string,
  warnings: ParseWarning[],
): number | null {
  try {
    return parsePitchName(name);
  } catch (err) {
    warnings.push({
      location,
      token: name,
      message: err instanceof Error ? err.message : String(err),
    });
    return null;
  }
}
