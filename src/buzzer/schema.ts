/**
 * Buzzer Module - Schemas and Types
 *
 * The buzzer hangs off a GPIO line driven through the libgpiod command
 * line tools (gpiofind / gpioset).
 */
import type { Result } from "neverthrow";

import type { BuzzerError } from "./errors.js";

/**
 * Buzzer configuration.
 */
export type BuzzerConfig = Readonly<{
  /** When false, state changes are accepted but never reach hardware */
  enabled: boolean;
  /** GPIO line name passed to gpiofind */
  lineName: string;
  /** Interval between level flips while alerting */
  blinkIntervalMs: number;
  /** Consecutive command failures before the blink loop gives up */
  failureLimit: number;
}>;

/**
 * Resolved hardware location of the buzzer line.
 */
export type GpioLine = Readonly<{
  chip: string;
  line: string;
}>;

export type GpioLevel = 0 | 1;

/**
 * Hardware command boundary. Swapped for a fake in tests.
 */
export type GpioRunner = Readonly<{
  find: (lineName: string) => Promise<Result<GpioLine, BuzzerError>>;
  set: (line: GpioLine, level: GpioLevel) => Promise<Result<void, BuzzerError>>;
}>;
