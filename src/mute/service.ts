/**
 * Mute Module - Service Layer
 *
 * Owns the {muted, deadline, timer} triple. Every transition bumps a
 * generation counter; a timer whose generation is stale does nothing,
 * so a cancelled timer that still fires cannot re-apply old state.
 */
import { createLogger } from "../logger.js";
import type { MuteConfig, MuteState, MuteStatus } from "./schema.js";
import { INITIAL_MUTE_STATE } from "./schema.js";
import { isMuteStateClean, toMuteStatus } from "./transform.js";

const log = createLogger("mute");

export type MuteController = Readonly<{
  getState: () => MuteState;
  getStatus: () => MuteStatus;
  isMuted: () => boolean;
  /** Start (or restart) a mute window of the configured duration */
  mute: () => MuteStatus;
  /** Clear any mute window. Returns null when there was nothing to clear. */
  forceUnmute: () => MuteStatus | null;
  /** Cancel the timer without notifying anyone (shutdown) */
  dispose: () => void;
}>;

export type MuteControllerOptions = Readonly<{
  config: MuteConfig;
  /** Called after the window expires on its own and the state is cleared */
  onExpire: (status: MuteStatus) => Promise<void>;
  now?: () => number;
}>;

export function createMuteController(
  options: MuteControllerOptions,
): MuteController {
  const now = options.now ?? Date.now;

  let state: MuteState = INITIAL_MUTE_STATE;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let generation = 0;

  const cancelTimer = (): void => {
    if (timer) {
      clearTimeout(timer);
      timer = null;
    }
  };

  const handleTimeout = (firedGeneration: number): void => {
    if (firedGeneration !== generation) {
      log.debug({ firedGeneration, generation }, "Stale mute timer ignored");
      return;
    }

    timer = null;
    generation++;
    state = INITIAL_MUTE_STATE;
    log.info("Mute window expired");

    options.onExpire(toMuteStatus(state)).catch((error: unknown) => {
      log.error({ error }, "Mute expiry handler failed");
    });
  };

  const mute = (): MuteStatus => {
    cancelTimer();
    generation++;

    const scheduled = generation;
    const deadline = now() + options.config.durationMs;
    timer = setTimeout(() => handleTimeout(scheduled), options.config.durationMs);
    state = { muted: true, deadline, timerActive: true };

    log.info(
      { durationMs: options.config.durationMs, deadline },
      "Alerts muted",
    );
    return toMuteStatus(state);
  };

  const forceUnmute = (): MuteStatus | null => {
    if (isMuteStateClean(state) && timer === null) {
      return null;
    }

    cancelTimer();
    generation++;
    state = INITIAL_MUTE_STATE;

    log.info("Alerts unmuted");
    return toMuteStatus(state);
  };

  const dispose = (): void => {
    cancelTimer();
    generation++;
    state = INITIAL_MUTE_STATE;
  };

  return {
    getState: () => state,
    getStatus: () => toMuteStatus(state),
    isMuted: () => state.muted,
    mute,
    forceUnmute,
    dispose,
  };
}
