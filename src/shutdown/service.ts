/**
 * Shutdown Module - Service Layer
 *
 * Owns the single process-wide shutdown flag.
 */
import { createLogger } from "../logger.js";
import type { Raced, ShutdownSignal } from "./schema.js";
import { DEFAULT_SLEEP_SLICE_MS } from "./schema.js";

const log = createLogger("shutdown");

/**
 * Create a shutdown signal.
 *
 * @param sliceMs - Upper bound on how long a sleep can ignore a shutdown request
 */
export function createShutdownSignal(
  sliceMs: number = DEFAULT_SLEEP_SLICE_MS,
): ShutdownSignal {
  let requested = false;
  const listeners = new Set<() => void>();

  const isRequested = (): boolean => requested;

  const request = (): boolean => {
    if (requested) {
      return false;
    }
    requested = true;
    log.info({ listeners: listeners.size }, "Shutdown requested");
    for (const listener of listeners) {
      listener();
    }
    listeners.clear();
    return true;
  };

  const onRequested = (listener: () => void): (() => void) => {
    if (requested) {
      listener();
      return () => {};
    }
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  const sleep = async (ms: number): Promise<void> => {
    let elapsed = 0;
    while (elapsed < ms && !requested) {
      const slice = Math.min(sliceMs, ms - elapsed);
      if (slice <= 0) {
        break;
      }
      await new Promise((resolve) => setTimeout(resolve, slice));
      elapsed += slice;
    }
  };

  return {
    isRequested,
    request,
    onRequested,
    sleep,
  };
}

/**
 * Wait for `pending` or the shutdown request, whichever comes first.
 * The listener is released when the race ends, so calling this in a
 * polling loop retains nothing between iterations.
 */
export async function raceShutdown<T>(
  signal: ShutdownSignal,
  pending: Promise<T>,
): Promise<Raced<T>> {
  let unsubscribe: () => void = () => {};
  const stopped = new Promise<Raced<T>>((resolve) => {
    unsubscribe = signal.onRequested(() => resolve({ kind: "shutdown" }));
  });

  try {
    return await Promise.race([
      pending.then((value): Raced<T> => ({ kind: "settled", value })),
      stopped,
    ]);
  } finally {
    unsubscribe();
  }
}
