/**
 * Realtime Module - Public API
 */

// Types
export type {
  ChangePayload,
  RealtimeConfig,
  RealtimeConnection,
  RealtimeConnector,
  ReceiveResult,
} from "./schema.js";
export { ChangePayloadSchema } from "./schema.js";

// Errors
export type { RealtimeError } from "./errors.js";
export {
  channelClosed,
  connectFailed,
  formatRealtimeError,
  subscribeFailed,
} from "./errors.js";

// Client
export { createSupabaseConnector } from "./client.js";
export type { ReceiveQueue } from "./queue.js";
export { createReceiveQueue } from "./queue.js";

// Service
export type { RealtimeListener, RealtimeListenerOptions } from "./service.js";
export { createRealtimeListener } from "./service.js";

// Pure transformations (for testing)
export { decodeChange } from "./transform.js";
