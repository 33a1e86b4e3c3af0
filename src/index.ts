// ─── midi-to-mida ───────────────────────────────────────────────────────────
//
// Converts MIDI files into MIDA, a text notation of quantized drum and
// melodic timelines.
//
// Usage:
//   import { convertMidiFile } from "midi-to-mida";
//   const { document } = await convertMidiFile("song.mid");
// ─────────────────────────────────────────────────────────────────────────────

// Export converter
export {
  convertPerformance,
  convertMidiBuffer,
  convertMidiFile,
  MIN_DRUM_TICKS_PER_BEAT,
  MIN_MELODIC_TICKS_PER_BEAT,
} from "./mida/convert.js";
export type { MidaConversion } from "./mida/convert.js";

// Export encoders
export {
  collectDrumHits,
  renderDrumSlot,
  encodeDrumAudicles,
} from "./mida/drums.js";
export type { DrumHit } from "./mida/drums.js";

export {
  sweepHeldPitches,
  renderMelodicSlots,
  encodeMelodicAudicle,
} from "./mida/melodic.js";

export {
  PERCUSSION_CHANNEL,
  messageChannel,
  isPercussionTrack,
  reconstructNoteEvents,
} from "./mida/tracks.js";

export { classifyVelocity, ACCENT_THRESHOLD, SOFT_THRESHOLD } from "./mida/velocity.js";

export { assembleDocument, previewDocument, DEFAULT_PREVIEW_LENGTH } from "./mida/document.js";

// Export MIDA reader + step view
export { parseMidaDocument, parseMelodicAudicle, parseDrumAudicle } from "./mida/reader.js";
export type { MidaReadResult } from "./mida/reader.js";

export { renderStepView, cellAt } from "./mida/steps.js";

// Export pitch names
export { pitchName, parsePitchName, safeParsePitchName } from "./note-parser.js";

// Export MIDI file parser
export { parseMidiFile, parseMidiBuffer } from "./midi/parser.js";
export type {
  MidiMessage,
  NoteOnMessage,
  NoteOffMessage,
  ChannelMessage,
  MetaMessage,
  MidiTrack,
  Performance,
  NoteEvent,
} from "./midi/types.js";

// Export options schema
export { ConvertOptionsSchema } from "./schemas.js";
export type { ConvertOptions, ConvertOptionsInput } from "./schemas.js";

// Export types
export type {
  AccentToken,
  Audicle,
  DrumAudicle,
  MelodicAudicle,
  DrumSlot,
  MelodicSlot,
  ParseWarning,
} from "./types.js";

export {
  ACCENTS,
  DRUM_REST,
  MELODIC_REST,
  SUSTAIN,
  CHORD_SEPARATOR,
  HEADER_MARKER,
  QUOTE_MARKER,
  EMPTY_DOCUMENT,
} from "./types.js";
