/**
 * Notifications Module - Service Layer
 *
 * Publishes station notifications to every connected SSE client.
 */
import { createLogger } from "../logger.js";
import {
  broadcastAlertAdded,
  broadcastAlertRemoved,
  broadcastDeviceStatus,
  broadcastMuteChanged,
} from "../sse/index.js";
import type { StationNotifier } from "./schema.js";

const log = createLogger("notifications");

/**
 * Create a notifier backed by the SSE broadcaster.
 */
export function createSseNotifier(): StationNotifier {
  return {
    alertAdded: (alert) => {
      log.debug({ id: alert.id }, "Notifying alert added");
      broadcastAlertAdded(alert);
    },
    alertRemoved: (id) => {
      log.debug({ id }, "Notifying alert removed");
      broadcastAlertRemoved(id);
    },
    muteChanged: (status) => {
      log.debug({ ...status }, "Notifying mute change");
      broadcastMuteChanged(status);
    },
    deviceStatusChanged: (update) => {
      log.debug({ ...update }, "Notifying device status");
      broadcastDeviceStatus(update);
    },
  };
}
