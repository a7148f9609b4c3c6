/**
 * Mute Module - Pure Transformations
 */
import type { MuteState, MuteStatus } from "./schema.js";

/**
 * Format a mute deadline as ISO-8601 UTC without fractional seconds.
 *
 * @example formatDeadline(Date.UTC(2025, 0, 1, 10)) // "2025-01-01T10:00:00Z"
 */
export function formatDeadline(deadline: number | null): string | null {
  if (deadline === null) {
    return null;
  }
  return new Date(deadline).toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Project internal state to the public status payload.
 */
export function toMuteStatus(state: MuteState): MuteStatus {
  return {
    muted: state.muted,
    expiresAt: formatDeadline(state.deadline),
  };
}

/**
 * True when nothing is muted and nothing is pending.
 */
export function isMuteStateClean(state: MuteState): boolean {
  return !state.muted && state.deadline === null && !state.timerActive;
}

/**
 * Check the mute invariant: muted ⇔ deadline set ⇔ timer live.
 */
export function isMuteStateConsistent(state: MuteState): boolean {
  const hasDeadline = state.deadline !== null;
  return state.muted === hasDeadline && hasDeadline === state.timerActive;
}
