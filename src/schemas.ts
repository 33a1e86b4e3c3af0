// ─── Conversion Options Schema ───────────────────────────────────────────────
//
// Options accepted by the converter, the CLI and the MCP server.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { DEFAULT_PREVIEW_LENGTH } from "./mida/document.js";
import { PERCUSSION_CHANNEL } from "./mida/tracks.js";

export const ConvertOptionsSchema = z.object({
  /** Channel whose notes are written as drum audicles (0-based). */
  percussionChannel: z.number().int().min(0).max(15).default(PERCUSSION_CHANNEL),
  /** Characters shown by document previews. */
  previewLength: z.number().int().positive().default(DEFAULT_PREVIEW_LENGTH),
});

/** Options after defaults are applied. */
export type ConvertOptions = z.infer<typeof ConvertOptionsSchema>;

/** Options as callers may pass them. */
export type ConvertOptionsInput = z.input<typeof ConvertOptionsSchema>;
