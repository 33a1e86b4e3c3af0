// ─── MIDI File Parser ────────────────────────────────────────────────────────
//
// Reads standard MIDI file bytes with `midi-file` and reduces every event to
// the tagged MidiMessage union. Delta times and in-track order are kept as-is.
// ─────────────────────────────────────────────────────────────────────────────

import { parseMidi, type MidiData } from "midi-file";
import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import type { MidiMessage, MidiTrack, Performance } from "./types.js";

type MidiFileEvent = MidiData["tracks"][number][number];

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Parse MIDI bytes into a Performance.
 * Throws when the bytes are not a MIDI file or use SMPTE timing.
 */
export function parseMidiBuffer(bytes: Uint8Array): Performance {
  let midi: MidiData;
  try {
    midi = parseMidi(bytes);
  } catch (err) {
    throw new Error(`Failed to load MIDI file: ${err instanceof Error ? err.message : String(err)}`);
  }

  const ticksPerBeat = midi.header.ticksPerBeat;
  if (ticksPerBeat === undefined) {
    throw new Error("Unsupported MIDI timing: SMPTE time division has no ticks per beat");
  }

  return {
    ticksPerBeat,
    tracks: midi.tracks.map(toTrack),
  };
}

/** Read and parse a MIDI file from disk. */
export async function parseMidiFile(path: string): Promise<Performance> {
  if (!existsSync(path)) {
    throw new Error(`File not found: "${path}"`);
  }
  const bytes = await readFile(path);
  return parseMidiBuffer(new Uint8Array(bytes));
}

// ─── Internal ────────────────────────────────────────────────────────────────

function toTrack(events: MidiFileEvent[]): MidiTrack {
  return events.map(toMessage);
}

function toMessage(event: MidiFileEvent): MidiMessage {
  switch (event.type) {
    case "noteOn":
      return {
        kind: "noteOn",
        deltaTime: event.deltaTime,
        channel: event.channel,
        pitch: event.noteNumber,
        velocity: event.velocity,
      };
    case "noteOff":
      return {
        kind: "noteOff",
        deltaTime: event.deltaTime,
        channel: event.channel,
        pitch: event.noteNumber,
      };
    case "noteAftertouch":
    case "controller":
    case "programChange":
    case "channelAftertouch":
    case "pitchBend":
      return { kind: "channel", deltaTime: event.deltaTime, channel: event.channel };
    default:
      return { kind: "meta", deltaTime: event.deltaTime };
  }
}
