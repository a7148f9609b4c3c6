/**
 * SSE Module - Schemas and Types
 *
 * Defines the event types for Server-Sent Events.
 */
import type { Alert } from "../alerts/index.js";
import type { DeviceStatusUpdate } from "../refrigerator/index.js";

// =============================================================================
// SSE Event Types
// =============================================================================

/**
 * A new alert became active.
 */
export type AlertAddedEvent = Readonly<{
  type: "alert_added";
  alert: Alert;
}>;

/**
 * An alert was cleared or removed by the user.
 */
export type AlertRemovedEvent = Readonly<{
  type: "alert_removed";
  id: string;
}>;

/**
 * Mute window started or ended.
 */
export type MuteChangedEvent = Readonly<{
  type: "mute_changed";
  muted: boolean;
  expiresAt: string | null;
}>;

/**
 * New refrigerator status vector.
 */
export type DeviceStatusChangedEvent = Readonly<
  {
    type: "device_status_changed";
  } & DeviceStatusUpdate
>;

/**
 * Union of all SSE event types.
 */
export type SseEvent =
  | AlertAddedEvent
  | AlertRemovedEvent
  | MuteChangedEvent
  | DeviceStatusChangedEvent;
