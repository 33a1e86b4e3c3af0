// ─── Melodic Timeline Encoder ────────────────────────────────────────────────
//
// One sixteenth-note grid per non-percussion track. Each slot holds the set
// of pitches sounding during it; the grid renders as a melodic audicle:
// "*C4~E4~G4 - - . D4*".
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiTrack, NoteEvent } from "../midi/types.js";
import { CHORD_SEPARATOR, MELODIC_REST, SUSTAIN } from "../types.js";
import { pitchName } from "../note-parser.js";
import { reconstructNoteEvents, slotCountFor, trimTrailing } from "./tracks.js";

interface SweepState {
  /** Index of the next unconsumed event. */
  cursor: number;
  /** Pitches held after the last consumed event. */
  held: ReadonlySet<number>;
  /** Held-pitch snapshot per finished slot. */
  slots: ReadonlySet<number>[];
}

function applyEvent(held: ReadonlySet<number>, event: NoteEvent): ReadonlySet<number> {
  const next = new Set(held);
  if (event.kind === "attack") {
    next.add(event.pitch);
  } else {
    next.delete(event.pitch);
  }
  return next;
}

/**
 * Sweep the grid slot by slot. Every event with a tick before the slot's end
 * is applied in track order, then the held set is recorded for that slot.
 */
export function sweepHeldPitches(
  events: readonly NoteEvent[],
  slotTicks: number,
  slotCount: number,
): ReadonlySet<number>[] {
  const initial: SweepState = { cursor: 0, held: new Set(), slots: [] };

  const final = Array.from({ length: slotCount }, (_, slot) => slot * slotTicks + slotTicks)
    .reduce<SweepState>((state, slotEnd) => {
      let { cursor, held } = state;
      while (cursor < events.length && events[cursor].tick < slotEnd) {
        held = applyEvent(held, events[cursor]);
        cursor++;
      }
      state.slots.push(new Set(held));
      return { cursor, held, slots: state.slots };
    }, initial);

  return final.slots;
}

function sameSet(a: ReadonlySet<number>, b: ReadonlySet<number>): boolean {
  if (a.size !== b.size) return false;
  for (const value of a) {
    if (!b.has(value)) return false;
  }
  return true;
}

/**
 * Render held-pitch snapshots as melodic tokens. An unchanged, non-empty set
 * becomes the sustain marker.
 */
export function renderMelodicSlots(slots: readonly ReadonlySet<number>[]): string[] {
  let previous: ReadonlySet<number> = new Set();
  return slots.map(held => {
    let token: string;
    if (held.size === 0) {
      token = MELODIC_REST;
    } else if (sameSet(held, previous)) {
      token = SUSTAIN;
    } else {
      token = [...held].sort((a, b) => a - b).map(pitchName).join(CHORD_SEPARATOR);
    }
    previous = held;
    return token;
  });
}

/**
 * Encode one track as a melodic audicle, or null when the track has no
 * sounding notes.
 */
export function encodeMelodicAudicle(track: MidiTrack, ticksPerBeat: number): string | null {
  const events = reconstructNoteEvents(track);
  if (events.length === 0) return null;

  const slotTicks = Math.floor(ticksPerBeat / 4);
  const lastTick = events.reduce((max, e) => Math.max(max, e.tick), 0);
  const slots = sweepHeldPitches(events, slotTicks, slotCountFor(lastTick, slotTicks));

  const tokens = trimTrailing(renderMelodicSlots(slots), MELODIC_REST);
  if (tokens.length === 0) return null;
  return `*${tokens.join(" ")}*`;
}
