// ─── Drum Timeline Encoder ───────────────────────────────────────────────────
//
// Pools percussion hits from every track, one eighth-note grid per drum
// pitch, and renders each grid as a drum audicle: "(^| _ {*| v|} *|)".
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiTrack } from "../midi/types.js";
import { DRUM_REST } from "../types.js";
import { classifyVelocity } from "./velocity.js";
import { PERCUSSION_CHANNEL, reconstructNoteEvents, slotCountFor, trimTrailing } from "./tracks.js";

/** A single drum hit with its absolute tick. */
export interface DrumHit {
  tick: number;
  velocity: number;
}

/**
 * Collect attacks on the percussion channel from all tracks, grouped by
 * pitch. Channel is checked per message, so a percussion note inside an
 * otherwise melodic track still counts.
 */
export function collectDrumHits(
  tracks: readonly MidiTrack[],
  percussionChannel: number = PERCUSSION_CHANNEL,
): Map<number, DrumHit[]> {
  const hits = new Map<number, DrumHit[]>();

  for (const track of tracks) {
    for (const event of reconstructNoteEvents(track, percussionChannel)) {
      if (event.kind !== "attack") continue;
      const list = hits.get(event.pitch);
      const hit = { tick: event.tick, velocity: event.velocity };
      if (list) {
        list.push(hit);
      } else {
        hits.set(event.pitch, [hit]);
      }
    }
  }

  return hits;
}

/** Render one slot's velocities as a drum token. */
export function renderDrumSlot(velocities: readonly number[]): string {
  if (velocities.length === 0) return DRUM_REST;
  if (velocities.length === 1) return classifyVelocity(velocities[0]);
  return `{${velocities.map(classifyVelocity).join(" ")}}`;
}

/**
 * Encode all percussion in the performance as drum audicles, one per pitch
 * that has at least one hit, in ascending pitch order.
 */
export function encodeDrumAudicles(
  tracks: readonly MidiTrack[],
  ticksPerBeat: number,
  percussionChannel: number = PERCUSSION_CHANNEL,
): string[] {
  const hits = collectDrumHits(tracks, percussionChannel);
  if (hits.size === 0) return [];

  const slotTicks = Math.floor(ticksPerBeat / 2);
  let lastTick = 0;
  for (const list of hits.values()) {
    for (const hit of list) lastTick = Math.max(lastTick, hit.tick);
  }
  const slotCount = slotCountFor(lastTick, slotTicks);

  const pitches = [...hits.keys()].sort((a, b) => a - b);
  const audicles: string[] = [];

  for (const pitch of pitches) {
    const slots: number[][] = Array.from({ length: slotCount }, () => []);
    for (const hit of hits.get(pitch) ?? []) {
      slots[Math.floor(hit.tick / slotTicks)].push(hit.velocity);
    }

    const tokens = trimTrailing(slots.map(renderDrumSlot), DRUM_REST);
    if (tokens.length === 0) continue;
    audicles.push(`(${tokens.join(" ")})`);
  }

  return audicles;
}
