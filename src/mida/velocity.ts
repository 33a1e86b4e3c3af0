// ─── Velocity Classification ─────────────────────────────────────────────────

import { ACCENTS, type AccentToken } from "../types.js";

/** Lowest velocity written as an accented hit. */
export const ACCENT_THRESHOLD = 110;

/** Highest velocity written as a soft hit. */
export const SOFT_THRESHOLD = 40;

/**
 * Map a velocity (0–127) to a drum accent token.
 * ≥ 110 → "^|", ≤ 40 → "v|", anything else → "*|".
 */
export function classifyVelocity(velocity: number): AccentToken {
  if (velocity >= ACCENT_THRESHOLD) return ACCENTS.accented;
  if (velocity <= SOFT_THRESHOLD) return ACCENTS.soft;
  return ACCENTS.normal;
}
