/**
 * Mute Module - Public API
 */

// Types
export type { MuteConfig, MuteState, MuteStatus } from "./schema.js";
export { INITIAL_MUTE_STATE } from "./schema.js";

// Service
export type { MuteController, MuteControllerOptions } from "./service.js";
export { createMuteController } from "./service.js";

// Pure transformations (for testing)
export {
  formatDeadline,
  isMuteStateClean,
  isMuteStateConsistent,
  toMuteStatus,
} from "./transform.js";
