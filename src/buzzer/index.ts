/**
 * Buzzer Module - Public API
 */

// Types
export type {
  BuzzerConfig,
  GpioLevel,
  GpioLine,
  GpioRunner,
} from "./schema.js";
export type { BuzzerError } from "./errors.js";
export {
  commandFailed,
  formatBuzzerError,
  launchFailed,
  malformedOutput,
} from "./errors.js";

// Service
export type { BuzzerDriver, BuzzerDriverOptions } from "./service.js";
export { createBuzzerDriver } from "./service.js";
export { createGpioCommandRunner } from "./gpio.js";

// Pure transformations (for testing)
export { flipLevel, gpiosetArgs, parseGpiofindOutput } from "./transform.js";
