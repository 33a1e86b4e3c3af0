// ─── MIDI → MIDA Converter ───────────────────────────────────────────────────
//
// Runs the drum and melodic encoders over a Performance and assembles the
// document. Resolution is checked here, per grid that has notes to place;
// the encoders assume it is valid.
// ─────────────────────────────────────────────────────────────────────────────

import type { Performance } from "../midi/types.js";
import { parseMidiBuffer, parseMidiFile } from "../midi/parser.js";
import { ConvertOptionsSchema, type ConvertOptionsInput } from "../schemas.js";
import { collectDrumHits, encodeDrumAudicles } from "./drums.js";
import { encodeMelodicAudicle } from "./melodic.js";
import { assembleDocument, previewDocument } from "./document.js";
import { isPercussionTrack, reconstructNoteEvents } from "./tracks.js";

/** Smallest resolution that gives the eighth-note drum grid one tick per slot. */
export const MIN_DRUM_TICKS_PER_BEAT = 2;

/** Smallest resolution that gives the sixteenth-note melodic grid one tick per slot. */
export const MIN_MELODIC_TICKS_PER_BEAT = 4;

/** Result of a conversion. */
export interface MidaConversion {
  /** The MIDA document text. */
  document: string;
  /** The document cut to the configured preview length. */
  preview: string;
  /** Drum audicles in ascending pitch order. */
  drumAudicles: string[];
  /** Melodic audicles in track order. */
  melodicAudicles: string[];
  trackCount: number;
  percussionTrackCount: number;
  ticksPerBeat: number;
}

function requireGrid(ticksPerBeat: number, minimum: number, grid: string): void {
  if (ticksPerBeat < minimum) {
    throw new Error(
      `Invalid resolution: ${ticksPerBeat} ticks per beat (the ${grid} grid needs at least ${minimum})`,
    );
  }
}

/**
 * Convert an already-parsed performance to MIDA.
 */
export function convertPerformance(
  performance: Performance,
  options: ConvertOptionsInput = {},
): MidaConversion {
  const { percussionChannel, previewLength } = ConvertOptionsSchema.parse(options);
  const { ticksPerBeat, tracks } = performance;

  if (!Number.isInteger(ticksPerBeat) || ticksPerBeat < 1) {
    throw new Error(`Invalid resolution: ${ticksPerBeat} ticks per beat (must be a positive integer)`);
  }

  if (collectDrumHits(tracks, percussionChannel).size > 0) {
    requireGrid(ticksPerBeat, MIN_DRUM_TICKS_PER_BEAT, "drum");
  }
  const drumAudicles = encodeDrumAudicles(tracks, ticksPerBeat, percussionChannel);

  const melodicAudicles: string[] = [];
  let percussionTrackCount = 0;
  for (const track of tracks) {
    if (isPercussionTrack(track, percussionChannel)) {
      percussionTrackCount++;
      continue;
    }
    if (reconstructNoteEvents(track).length > 0) {
      requireGrid(ticksPerBeat, MIN_MELODIC_TICKS_PER_BEAT, "melodic");
    }
    const audicle = encodeMelodicAudicle(track, ticksPerBeat);
    if (audicle) melodicAudicles.push(audicle);
  }

  const document = assembleDocument(drumAudicles, melodicAudicles);

  return {
    document,
    preview: previewDocument(document, previewLength),
    drumAudicles,
    melodicAudicles,
    trackCount: tracks.length,
    percussionTrackCount,
    ticksPerBeat,
  };
}

/** Convert MIDI file bytes to MIDA. */
export function convertMidiBuffer(
  bytes: Uint8Array,
  options: ConvertOptionsInput = {},
): MidaConversion {
  return convertPerformance(parseMidiBuffer(bytes), options);
}

/** Read a MIDI file from disk and convert it to MIDA. */
export async function convertMidiFile(
  path: string,
  options: ConvertOptionsInput = {},
): Promise<MidaConversion> {
  return convertPerformance(await parseMidiFile(path), options);
}
