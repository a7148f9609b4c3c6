/**
 * Notifications Module - Public API
 */
export type { StationNotifier } from "./schema.js";
export { createSseNotifier } from "./service.js";
