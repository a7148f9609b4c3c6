/**
 * SSE Service Tests
 *
 * Reads frames straight off the event streams.
 */
import { afterEach, describe, expect, test, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import {
  broadcastAlertAdded,
  broadcastAlertRemoved,
  broadcastDeviceStatus,
  broadcastMuteChanged,
  disconnectAllClients,
  getClientCount,
  openEventStream,
} from "../service.js";

const decoder = new TextDecoder();

async function readText(
  reader: ReadableStreamDefaultReader<Uint8Array>,
): Promise<string> {
  const { value } = await reader.read();
  return decoder.decode(value);
}

/** Open a stream and consume its `connected` frame */
async function openReader(): Promise<ReadableStreamDefaultReader<Uint8Array>> {
  const reader = openEventStream().stream.getReader();
  await reader.read();
  return reader;
}

describe("SSE Service", () => {
  afterEach(() => {
    disconnectAllClients();
  });

  describe("openEventStream", () => {
    test("registers each stream with a fresh id", () => {
      const first = openEventStream();
      const second = openEventStream();

      expect(getClientCount()).toBe(2);
      expect(second.clientId).toBe(first.clientId + 1);
    });

    test("sends the connected frame then the initial events", async () => {
      const { stream, clientId } = openEventStream([
        { type: "mute_changed", muted: false, expiresAt: null },
      ]);
      const reader = stream.getReader();

      expect(await readText(reader)).toBe(
        `event: connected\ndata: {"clientId":${clientId}}\n\n`,
      );
      expect(await readText(reader)).toBe(
        'event: mute_changed\ndata: {"type":"mute_changed","muted":false,"expiresAt":null}\n\n',
      );
    });

    test("a cancelled stream is forgotten", async () => {
      const { stream } = openEventStream();

      await stream.cancel();

      expect(getClientCount()).toBe(0);
    });
  });

  describe("broadcasts", () => {
    test("alert_removed reaches every open stream", async () => {
      const first = await openReader();
      const second = await openReader();

      broadcastAlertRemoved("a1");

      const expected =
        'event: alert_removed\ndata: {"type":"alert_removed","id":"a1"}\n\n';
      expect(await readText(first)).toBe(expected);
      expect(await readText(second)).toBe(expected);
    });

    test("does nothing when no stream is open", () => {
      expect(() => broadcastAlertRemoved("a1")).not.toThrow();
    });

    test("alert_added carries the whole alert", async () => {
      const reader = await openReader();

      broadcastAlertAdded({
        id: "a1",
        dateTime: "01/03/2025 12:00:00",
        type: "tempUp",
        device: "Fridge",
        description: "Too warm",
      });

      expect(await readText(reader)).toBe(
        'event: alert_added\ndata: {"type":"alert_added","alert":' +
          '{"id":"a1","dateTime":"01/03/2025 12:00:00","type":"tempUp",' +
          '"device":"Fridge","description":"Too warm"}}\n\n',
      );
    });

    test("mute_changed flattens the mute status", async () => {
      const reader = await openReader();

      broadcastMuteChanged({ muted: true, expiresAt: "2025-03-01T12:10:00Z" });

      expect(await readText(reader)).toBe(
        'event: mute_changed\ndata: {"type":"mute_changed","muted":true,' +
          '"expiresAt":"2025-03-01T12:10:00Z"}\n\n',
      );
    });

    test("device_status_changed carries timestamp and vector", async () => {
      const reader = await openReader();

      broadcastDeviceStatus({
        timestamp: "2025-03-01 12:30:00",
        status: [0, 1, 0, 0, 1, 1],
      });

      expect(await readText(reader)).toBe(
        'event: device_status_changed\ndata: {"type":"device_status_changed",' +
          '"timestamp":"2025-03-01 12:30:00","status":[0,1,0,0,1,1]}\n\n',
      );
    });
  });

  describe("disconnectAllClients", () => {
    test("closes open streams", async () => {
      const reader = await openReader();

      disconnectAllClients();

      expect(getClientCount()).toBe(0);
      await expect(reader.read()).resolves.toEqual({ done: true, value: undefined });
    });
  });
});
