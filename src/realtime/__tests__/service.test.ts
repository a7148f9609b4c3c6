/**
 * Realtime Listener Tests
 *
 * Uses an in-process connector built on the receive queue.
 */
import { type Result, err, ok } from "neverthrow";
import { describe, expect, test, vi } from "vitest";

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

import { type ShutdownSignal, createShutdownSignal } from "../../shutdown/index.js";
import type { RealtimeError } from "../errors.js";
import { channelClosed, connectFailed, subscribeFailed } from "../errors.js";
import { createReceiveQueue } from "../queue.js";
import type { RealtimeConfig, RealtimeConnector } from "../schema.js";
import { createRealtimeListener } from "../service.js";

const CONFIG: RealtimeConfig = {
  url: "https://project.supabase.test",
  apiKey: "test-anon-key",
  schema: "public",
  channel: "schema-db-changes",
  pollTimeoutMs: 20,
  retry: { baseDelayMs: 5000, maxDelayMs: 60000 },
};

function createRecordingShutdown(limit: number) {
  const sleeps: number[] = [];
  const base = createShutdownSignal();
  let activeListeners = 0;

  const signal: ShutdownSignal = {
    ...base,
    onRequested: (listener) => {
      activeListeners++;
      const unsubscribe = base.onRequested(listener);
      return () => {
        activeListeners--;
        unsubscribe();
      };
    },
    sleep: async (ms) => {
      sleeps.push(ms);
      if (sleeps.length >= limit) {
        base.request();
      }
    },
  };

  return { signal, sleeps, activeListeners: () => activeListeners };
}

function createFakeConnection(
  subscribeResult: Result<void, RealtimeError> = ok(undefined),
) {
  const queue = createReceiveQueue();
  const connection = {
    subscribe: vi.fn(async () => subscribeResult),
    next: (timeoutMs: number) => queue.next(timeoutMs),
    close: vi.fn(async () => {
      queue.close(channelClosed("Closed locally"));
    }),
  };
  return { connection, queue };
}

const change = (message: string) => ({
  schema: "public",
  table: "device_status",
  commit_timestamp: "2025-03-01T18:30:00Z",
  eventType: "UPDATE",
  new: { id: 1, message },
  old: { id: 1 },
});

describe("createRealtimeListener", () => {
  test("backs off on connect failures", async () => {
    const { signal, sleeps } = createRecordingShutdown(3);
    const connector = {
      connect: vi.fn<RealtimeConnector["connect"]>(async () =>
        err(connectFailed("Invalid supabaseUrl")),
      ),
    };
    const listener = createRealtimeListener({
      config: CONFIG,
      connector,
      onStatusVector: vi.fn(async () => undefined),
      shutdown: signal,
    });

    await listener.run();

    expect(sleeps).toEqual([5000, 10000, 20000]);
    expect(listener.isConnected()).toBe(false);
  });

  test("a failed subscribe closes the connection", async () => {
    const { signal, sleeps } = createRecordingShutdown(1);
    const { connection } = createFakeConnection(
      err(subscribeFailed("CHANNEL_ERROR", "permission denied")),
    );
    const connector = {
      connect: vi.fn<RealtimeConnector["connect"]>(async () => ok(connection)),
    };
    const listener = createRealtimeListener({
      config: CONFIG,
      connector,
      onStatusVector: vi.fn(async () => undefined),
      shutdown: signal,
    });

    await listener.run();

    expect(connection.close).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([5000]);
  });

  test("hands each change to the monitor and reconnects when the channel closes", async () => {
    const { signal, sleeps } = createRecordingShutdown(1);
    const first = createFakeConnection();
    const second = createFakeConnection();
    const connector = {
      connect: vi
        .fn<RealtimeConnector["connect"]>()
        .mockResolvedValueOnce(ok(first.connection))
        .mockResolvedValueOnce(ok(second.connection)),
    };
    const onStatusVector = vi.fn(
      async (_message: string, _commitTimestamp: string) => undefined,
    );

    first.queue.push(change("[0,1,0,0,1,1]"));
    first.queue.push({ unexpected: true });
    first.queue.push(change("[0,0,0,0,0,0]"));
    first.queue.close(channelClosed("CLOSED"));

    const listener = createRealtimeListener({
      config: CONFIG,
      connector,
      onStatusVector,
      shutdown: signal,
    });

    await listener.run();

    expect(onStatusVector.mock.calls).toEqual([
      ["[0,1,0,0,1,1]", "2025-03-01T18:30:00Z"],
      ["[0,0,0,0,0,0]", "2025-03-01T18:30:00Z"],
    ]);
    expect(sleeps).toEqual([5000]);
    expect(connector.connect).toHaveBeenCalledTimes(1);
  });

  test("keeps polling through timeouts until shutdown", async () => {
    const { signal } = createRecordingShutdown(Number.POSITIVE_INFINITY);
    const { connection, queue } = createFakeConnection();
    const connector = {
      connect: vi.fn<RealtimeConnector["connect"]>(async () => ok(connection)),
    };
    const onStatusVector = vi.fn(
      async (_message: string, _commitTimestamp: string) => undefined,
    );
    const listener = createRealtimeListener({
      config: CONFIG,
      connector,
      onStatusVector,
      shutdown: signal,
    });

    const running = listener.run();
    await vi.waitFor(() => expect(connection.subscribe).toHaveBeenCalled());
    expect(listener.isConnected()).toBe(true);

    // Several poll timeouts pass without a failure
    await new Promise((resolve) => setTimeout(resolve, 70));
    queue.push(change("[1,0,0,0,0,0]"));
    await vi.waitFor(() => expect(onStatusVector).toHaveBeenCalledTimes(1));

    signal.request();
    await running;

    expect(connector.connect).toHaveBeenCalledTimes(1);
    expect(connection.close).toHaveBeenCalledTimes(1);
    expect(listener.isConnected()).toBe(false);
  });

  test("polling holds a single shutdown listener at a time", async () => {
    const { signal, activeListeners } = createRecordingShutdown(
      Number.POSITIVE_INFINITY,
    );
    const { connection } = createFakeConnection();
    const connector = {
      connect: vi.fn<RealtimeConnector["connect"]>(async () => ok(connection)),
    };
    const listener = createRealtimeListener({
      config: CONFIG,
      connector,
      onStatusVector: vi.fn(async () => undefined),
      shutdown: signal,
    });

    const running = listener.run();
    await vi.waitFor(() => expect(connection.subscribe).toHaveBeenCalled());
    await new Promise((resolve) => setTimeout(resolve, 110));

    expect(activeListeners()).toBe(1);

    signal.request();
    await running;
    expect(activeListeners()).toBe(0);
  });

  test("shutdown interrupts a pending subscribe", async () => {
    const { signal, sleeps } = createRecordingShutdown(Number.POSITIVE_INFINITY);
    const { connection } = createFakeConnection();
    connection.subscribe.mockImplementation(
      () => new Promise<Result<void, RealtimeError>>(() => {}),
    );
    const connector = {
      connect: vi.fn<RealtimeConnector["connect"]>(async () => ok(connection)),
    };
    const listener = createRealtimeListener({
      config: CONFIG,
      connector,
      onStatusVector: vi.fn(async () => undefined),
      shutdown: signal,
    });

    const running = listener.run();
    await vi.waitFor(() => expect(connection.subscribe).toHaveBeenCalled());
    signal.request();
    await running;

    expect(connection.close).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
  });

  test("a failing monitor does not end the session", async () => {
    const { signal } = createRecordingShutdown(Number.POSITIVE_INFINITY);
    const { connection, queue } = createFakeConnection();
    const connector = {
      connect: vi.fn<RealtimeConnector["connect"]>(async () => ok(connection)),
    };
    const onStatusVector = vi
      .fn(async (_message: string, _commitTimestamp: string) => undefined)
      .mockRejectedValueOnce(new Error("monitor failed"));

    queue.push(change("[1,0,0,0,0,0]"));
    queue.push(change("[0,0,0,0,0,0]"));

    const listener = createRealtimeListener({
      config: CONFIG,
      connector,
      onStatusVector,
      shutdown: signal,
    });
    const running = listener.run();

    await vi.waitFor(() => expect(onStatusVector).toHaveBeenCalledTimes(2));
    signal.request();
    await running;

    expect(connector.connect).toHaveBeenCalledTimes(1);
  });
});
