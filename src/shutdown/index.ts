/**
 * Shutdown Module - Public API
 */
export type { Raced, ShutdownSignal } from "./schema.js";
export { DEFAULT_SLEEP_SLICE_MS } from "./schema.js";
export { createShutdownSignal, raceShutdown } from "./service.js";
