// ─── Track Classification & Event Reconstruction ────────────────────────────
//
// Turns delta-timed messages into absolute-tick note events. Ticks are
// accumulated over every message of the track (meta and controller messages
// included), and events keep the track's message order.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiMessage, MidiTrack, NoteEvent } from "../midi/types.js";

/** General MIDI percussion channel (the tenth of sixteen). */
export const PERCUSSION_CHANNEL = 9;

/** Channel carried by a message, or null for meta/sysex messages. */
export function messageChannel(message: MidiMessage): number | null {
  switch (message.kind) {
    case "noteOn":
    case "noteOff":
    case "channel":
      return message.channel;
    case "meta":
      return null;
  }
}

/**
 * A track is percussion when any of its messages is on the percussion
 * channel, whatever kind of message it is.
 */
export function isPercussionTrack(
  track: MidiTrack,
  percussionChannel: number = PERCUSSION_CHANNEL,
): boolean {
  return track.some(message => messageChannel(message) === percussionChannel);
}

/**
 * Reconstruct note events for a track.
 *
 * Attacks are note-ons with positive velocity; releases are note-offs and
 * note-ons with velocity 0. When `channel` is given, only messages on that
 * channel produce events (ticks still advance over every message).
 */
export function reconstructNoteEvents(track: MidiTrack, channel?: number): NoteEvent[] {
  const events: NoteEvent[] = [];
  let tick = 0;

  for (const message of track) {
    tick += message.deltaTime;

    switch (message.kind) {
      case "noteOn":
        if (channel !== undefined && message.channel !== channel) break;
        events.push(
          message.velocity > 0
            ? { tick, pitch: message.pitch, kind: "attack", velocity: message.velocity }
            : { tick, pitch: message.pitch, kind: "release", velocity: 0 },
        );
        break;
      case "noteOff":
        if (channel !== undefined && message.channel !== channel) break;
        events.push({ tick, pitch: message.pitch, kind: "release", velocity: 0 });
        break;
      case "channel":
      case "meta":
        break;
    }
  }

  return events;
}

/** Number of slots needed to reach `lastTick`: ceil(lastTick / slotTicks) + 1. */
export function slotCountFor(lastTick: number, slotTicks: number): number {
  return Math.floor((lastTick + slotTicks - 1) / slotTicks) + 1;
}

/** Drop trailing `empty` tokens. */
export function trimTrailing(tokens: readonly string[], empty: string): string[] {
  let end = tokens.length;
  while (end > 0 && tokens[end - 1] === empty) end--;
  return tokens.slice(0, end);
}
