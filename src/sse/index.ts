/**
 * SSE Module - Public API
 *
 * Exports types and service functions for Server-Sent Events.
 */

// Types
export type {
  AlertAddedEvent,
  AlertRemovedEvent,
  DeviceStatusChangedEvent,
  MuteChangedEvent,
  SseEvent,
} from "./schema.js";

// Service functions
export {
  broadcastAlertAdded,
  broadcastAlertRemoved,
  broadcastDeviceStatus,
  broadcastMuteChanged,
  disconnectAllClients,
  getClientCount,
  openEventStream,
} from "./service.js";
