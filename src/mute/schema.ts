/**
 * Mute Module - Schemas and Types
 *
 * Mute window state: the buzzer is silenced while alerts stay visible.
 */

/**
 * Mute configuration.
 */
export type MuteConfig = Readonly<{
  /** Length of a mute window in milliseconds */
  durationMs: number;
}>;

/**
 * Internal mute state.
 * Invariant: muted ⇔ deadline !== null ⇔ timerActive.
 */
export type MuteState = Readonly<{
  muted: boolean;
  /** Epoch millis when the mute window ends */
  deadline: number | null;
  timerActive: boolean;
}>;

/**
 * Mute status as exposed to the front end.
 */
export type MuteStatus = Readonly<{
  muted: boolean;
  /** ISO-8601 UTC with second precision, null when unmuted */
  expiresAt: string | null;
}>;

/**
 * Initial (unmuted) state.
 */
export const INITIAL_MUTE_STATE: MuteState = {
  muted: false,
  deadline: null,
  timerActive: false,
};
