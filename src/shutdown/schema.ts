/**
 * Shutdown Module - Schemas and Types
 *
 * Process-wide shutdown flag shared by every loop and timer.
 */

/**
 * Shutdown signal handle.
 *
 * Every suspension point (backoff sleeps, streaming reads, blink ticks)
 * checks `isRequested()` so shutdown is observed within one slice.
 */
export type ShutdownSignal = Readonly<{
  /** True once shutdown has been requested */
  isRequested: () => boolean;
  /** Request shutdown. Returns false if it was already requested. */
  request: () => boolean;
  /**
   * Register a listener for the shutdown request. Runs immediately if
   * shutdown was already requested. Returns the unsubscribe function.
   */
  onRequested: (listener: () => void) => () => void;
  /** Sleep in bounded slices, returning early on shutdown */
  sleep: (ms: number) => Promise<void>;
}>;

/**
 * Default slice length for shutdown-aware sleeps.
 */
export const DEFAULT_SLEEP_SLICE_MS = 200;

/**
 * Outcome of racing an operation against the shutdown request.
 */
export type Raced<T> =
  | Readonly<{ kind: "settled"; value: T }>
  | Readonly<{ kind: "shutdown" }>;
