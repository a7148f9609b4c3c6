/**
 * Alerts Module - Alert Store
 *
 * Canonical set of currently active alerts, keyed by id.
 * Pure data, no I/O. Every operation is synchronous, so callers on the
 * event loop never observe a partial update.
 */
import type { Alert } from "./schema.js";

export type AlertStore = Readonly<{
  /** Insert or overwrite by id */
  upsert: (alert: Alert) => void;
  /** Remove by id, returning the removed alert */
  remove: (id: string) => Alert | null;
  /** All active alerts, unordered */
  snapshot: () => Alert[];
  has: (id: string) => boolean;
  isEmpty: () => boolean;
  size: () => number;
}>;

export function createAlertStore(): AlertStore {
  const alerts = new Map<string, Alert>();

  return {
    upsert: (alert) => {
      alerts.set(alert.id, alert);
    },
    remove: (id) => {
      const existing = alerts.get(id);
      if (existing === undefined) {
        return null;
      }
      alerts.delete(id);
      return existing;
    },
    snapshot: () => [...alerts.values()],
    has: (id) => alerts.has(id),
    isEmpty: () => alerts.size === 0,
    size: () => alerts.size,
  };
}
