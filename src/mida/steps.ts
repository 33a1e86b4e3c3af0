// ─── Step View ───────────────────────────────────────────────────────────────
//
// Lays audicles side by side, one row per sixteenth step:
//
//   A1 A2
//   ^| C4 <
//   ^|  - <
//    _  . <
//
// Drum slots are eighth notes, so each drum cell fills two rows.
// ─────────────────────────────────────────────────────────────────────────────

import { pitchName } from "../note-parser.js";
import { CHORD_SEPARATOR, DRUM_REST, MELODIC_REST, SUSTAIN } from "../types.js";
import type { Audicle, DrumSlot, MelodicSlot } from "../types.js";

const CELL_WIDTH = 3;
const ROW_SUFFIX = " <";

/** Sixteenth steps covered by an audicle. */
export function stepLength(audicle: Audicle): number {
  return audicle.kind === "drum" ? audicle.slots.length * 2 : audicle.slots.length;
}

export function drumCell(slot: DrumSlot): string {
  if (slot.kind === "rest") return DRUM_REST;
  if (slot.accents.length === 1) return slot.accents[0];
  return `{${slot.accents.join(" ")}}`;
}

export function melodicCell(slot: MelodicSlot): string {
  switch (slot.kind) {
    case "rest":
      return MELODIC_REST;
    case "sustain":
      return SUSTAIN;
    case "pitches":
      return slot.pitches.map(pitchName).join(CHORD_SEPARATOR);
  }
}

/** Cell shown for an audicle at a given sixteenth step. */
export function cellAt(audicle: Audicle, step: number): string {
  if (audicle.kind === "drum") {
    const slot = audicle.slots[Math.floor(step / 2)];
    return slot ? drumCell(slot) : DRUM_REST;
  }
  const slot = audicle.slots[step];
  return slot ? melodicCell(slot) : MELODIC_REST;
}

/**
 * Render the step view. Returns an empty string when there are no audicles.
 */
export function renderStepView(audicles: readonly Audicle[]): string {
  if (audicles.length === 0) return "";

  const steps = Math.max(...audicles.map(stepLength));
  const pad = (cell: string): string => cell.padStart(CELL_WIDTH);

  const lines = [audicles.map((_, i) => pad(`A${i + 1}`)).join("")];
  for (let step = 0; step < steps; step++) {
    lines.push(audicles.map(a => pad(cellAt(a, step))).join("") + ROW_SUFFIX);
  }
  return lines.join("\n");
}
