/**
 * Notifications Module - Schemas and Types
 *
 * Outbound notifications consumed by the front end.
 */
import type { Alert } from "../alerts/index.js";
import type { MuteStatus } from "../mute/index.js";
import type { DeviceStatusUpdate } from "../refrigerator/index.js";

/**
 * Sink for station notifications.
 * Implementations must not throw.
 */
export type StationNotifier = Readonly<{
  alertAdded: (alert: Alert) => void;
  alertRemoved: (id: string) => void;
  muteChanged: (status: MuteStatus) => void;
  deviceStatusChanged: (update: DeviceStatusUpdate) => void;
}>;
