/**
 * Buzzer Module - Pure Transformations
 */
import { type Result, err, ok } from "neverthrow";

import type { BuzzerError } from "./errors.js";
import { malformedOutput } from "./errors.js";
import type { GpioLevel, GpioLine } from "./schema.js";

/**
 * Parse gpiofind output ("gpiochip0 17\n") into a line location.
 */
export function parseGpiofindOutput(
  stdout: string,
): Result<GpioLine, BuzzerError> {
  const [chip, line] = stdout.trim().split(/\s+/);
  if (!chip || !line) {
    return err(malformedOutput("gpiofind", stdout));
  }
  return ok({ chip, line });
}

/**
 * Arguments for gpioset driving a line to a level.
 *
 * @example gpiosetArgs({ chip: "gpiochip0", line: "17" }, 1) // ["gpiochip0", "17=1"]
 */
export function gpiosetArgs(line: GpioLine, level: GpioLevel): string[] {
  return [line.chip, `${line.line}=${level}`];
}

/**
 * Toggle a GPIO level.
 */
export function flipLevel(level: GpioLevel): GpioLevel {
  return level === 1 ? 0 : 1;
}
