/**
 * Exponential reconnect backoff shared by the MQTT and realtime loops.
 */

export type RetryPolicy = Readonly<{
  baseDelayMs: number;
  maxDelayMs: number;
}>;

/**
 * Next delay after a failure: double, capped at the ceiling.
 */
export function nextRetryDelay(currentMs: number, policy: RetryPolicy): number {
  return Math.min(currentMs * 2, policy.maxDelayMs);
}

export type Backoff = Readonly<{
  /** Delay to sleep before the next attempt */
  current: () => number;
  /** Back to the base delay (after a successful subscribe) */
  reset: () => void;
  /** Returns the delay to sleep now and doubles it for next time */
  advance: () => number;
}>;

export function createBackoff(policy: RetryPolicy): Backoff {
  let delay = policy.baseDelayMs;

  return {
    current: () => delay,
    reset: () => {
      delay = policy.baseDelayMs;
    },
    advance: () => {
      const sleepFor = delay;
      delay = nextRetryDelay(delay, policy);
      return sleepFor;
    },
  };
}
