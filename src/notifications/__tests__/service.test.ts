/**
 * Notifications Service Tests
 *
 * Verifies the SSE notifier forwards each station event to the broadcaster.
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

vi.mock("../../sse/index.js", () => ({
  broadcastAlertAdded: vi.fn(),
  broadcastAlertRemoved: vi.fn(),
  broadcastMuteChanged: vi.fn(),
  broadcastDeviceStatus: vi.fn(),
}));

import type { DeviceStatusUpdate } from "../../refrigerator/index.js";
import {
  broadcastAlertAdded,
  broadcastAlertRemoved,
  broadcastDeviceStatus,
  broadcastMuteChanged,
} from "../../sse/index.js";
import { createSseNotifier } from "../service.js";

describe("createSseNotifier", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  test("alertAdded broadcasts the alert", () => {
    const alert = {
      id: "A1",
      dateTime: "01/03/2025 12:00:00",
      type: "tempUp",
      device: "Fridge 2",
      description: "Temperatura alta",
    } as const;

    createSseNotifier().alertAdded(alert);

    expect(broadcastAlertAdded).toHaveBeenCalledWith(alert);
  });

  test("alertRemoved broadcasts the id", () => {
    createSseNotifier().alertRemoved("A1");

    expect(broadcastAlertRemoved).toHaveBeenCalledWith("A1");
  });

  test("muteChanged broadcasts the status", () => {
    createSseNotifier().muteChanged({
      muted: true,
      expiresAt: "2025-03-01T12:10:00Z",
    });

    expect(broadcastMuteChanged).toHaveBeenCalledWith({
      muted: true,
      expiresAt: "2025-03-01T12:10:00Z",
    });
  });

  test("deviceStatusChanged broadcasts the update", () => {
    const update: DeviceStatusUpdate = {
      timestamp: "2025-03-01 06:00:00",
      status: [1, 0, 0, 0, 0, 1],
    };

    createSseNotifier().deviceStatusChanged(update);

    expect(broadcastDeviceStatus).toHaveBeenCalledWith(update);
    expect(broadcastAlertAdded).not.toHaveBeenCalled();
  });
});
