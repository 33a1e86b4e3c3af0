// ─── MIDI Performance Types ─────────────────────────────────────────────────
//
// Tick-based view of a standard MIDI file, as handed to the MIDA encoders.
// Messages keep their delta times and their original order inside each
// track; nothing here is sorted or merged across tracks.
// ─────────────────────────────────────────────────────────────────────────────

/** Note-on message. A velocity of 0 is a release. */
export interface NoteOnMessage {
  kind: "noteOn";
  /** Ticks since the previous message in the same track. */
  deltaTime: number;
  /** MIDI channel (0–15). */
  channel: number;
  /** MIDI note number (0–127). 60 = middle C. */
  pitch: number;
  /** Velocity (0–127). */
  velocity: number;
}

/** Note-off message. */
export interface NoteOffMessage {
  kind: "noteOff";
  deltaTime: number;
  channel: number;
  pitch: number;
}

/** Any other channel voice message (controller, program change, bend, aftertouch). */
export interface ChannelMessage {
  kind: "channel";
  deltaTime: number;
  channel: number;
}

/** Meta or sysex message — carries no channel. */
export interface MetaMessage {
  kind: "meta";
  deltaTime: number;
}

export type MidiMessage = NoteOnMessage | NoteOffMessage | ChannelMessage | MetaMessage;

/** One track: messages in file order. */
export type MidiTrack = readonly MidiMessage[];

/** A parsed MIDI file, reduced to what the encoders read. */
export interface Performance {
  /** Ticks per quarter note (MIDI timing resolution). */
  ticksPerBeat: number;
  tracks: readonly MidiTrack[];
}

/** A note event with its absolute tick, reconstructed from one track. */
export interface NoteEvent {
  /** Absolute tick from the start of the track. */
  tick: number;
  pitch: number;
  kind: "attack" | "release";
  /** Attack velocity; 0 for releases. */
  velocity: number;
}
