/**
 * MQTT Alarm Listener Tests
 *
 * Drives the reconnection loop with an in-process broker connector and a
 * shutdown signal whose sleeps return immediately.
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
import { connectFailed, streamEnded, subscribeFailed } from "../errors.js";
import type { MqttError } from "../errors.js";
import type {
  BrokerConnector,
  BrokerSession,
  MqttConfig,
  SessionHandlers,
} from "../schema.js";
import { createMqttAlarmListener } from "../service.js";

const CONFIG: MqttConfig = {
  host: "broker.test",
  port: 8883,
  useTls: true,
  caPath: "certs/test-ca.crt",
  clientId: "hmi-test",
  username: "",
  password: "",
  topic: "v1/devices/me/rpc/request/+",
  keepaliveSeconds: 60,
  retry: { baseDelayMs: 5000, maxDelayMs: 60000 },
};

/**
 * Shutdown signal that records sleeps and requests shutdown after `limit` of them.
 */
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

function createFakeSession(
  closed: Promise<MqttError> = new Promise<MqttError>(() => {}),
  subscribeResult: Result<void, MqttError> = ok(undefined),
) {
  const session = {
    subscribe: vi.fn<BrokerSession["subscribe"]>(async () => subscribeResult),
    closed,
    end: vi.fn<BrokerSession["end"]>(async () => undefined),
  };
  return session;
}

function createFakeConnector() {
  const connect = vi.fn<BrokerConnector["connect"]>(async () =>
    err(connectFailed("connection refused")),
  );
  return { connect };
}

describe("createMqttAlarmListener", () => {
  test("backs off exponentially up to the ceiling", async () => {
    const { signal, sleeps } = createRecordingShutdown(6);
    const connector = createFakeConnector();
    const listener = createMqttAlarmListener({
      config: CONFIG,
      connector,
      onPayload: vi.fn(async () => undefined),
      shutdown: signal,
    });

    await listener.run();

    expect(sleeps).toEqual([5000, 10000, 20000, 40000, 60000, 60000]);
    expect(connector.connect).toHaveBeenCalledTimes(6);
    expect(listener.isConnected()).toBe(false);
  });

  test("a successful subscribe resets the backoff", async () => {
    const { signal, sleeps } = createRecordingShutdown(4);
    const connector = createFakeConnector();
    const dropped = createFakeSession(Promise.resolve(streamEnded("broker went away")));
    connector.connect
      .mockResolvedValueOnce(err(connectFailed("refused")))
      .mockResolvedValueOnce(err(connectFailed("refused")))
      .mockResolvedValueOnce(ok(dropped));
    const listener = createMqttAlarmListener({
      config: CONFIG,
      connector,
      onPayload: vi.fn(async () => undefined),
      shutdown: signal,
    });

    await listener.run();

    expect(sleeps).toEqual([5000, 10000, 5000, 10000]);
    expect(dropped.subscribe).toHaveBeenCalledWith(CONFIG.topic);
    expect(dropped.end).toHaveBeenCalledTimes(1);
  });

  test("a failed subscribe closes the session and backs off", async () => {
    const { signal, sleeps } = createRecordingShutdown(1);
    const connector = createFakeConnector();
    const rejected = createFakeSession(
      undefined,
      err(subscribeFailed(CONFIG.topic, "Broker rejected the subscription")),
    );
    connector.connect.mockResolvedValueOnce(ok(rejected));
    const listener = createMqttAlarmListener({
      config: CONFIG,
      connector,
      onPayload: vi.fn(async () => undefined),
      shutdown: signal,
    });

    await listener.run();

    expect(rejected.end).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([5000]);
  });

  test("delivers payloads in arrival order and tracks connectivity", async () => {
    const { signal } = createRecordingShutdown(Number.POSITIVE_INFINITY);
    const session = createFakeSession();
    const captured: { handlers: SessionHandlers | null } = { handlers: null };
    const connector = {
      connect: vi.fn<BrokerConnector["connect"]>(async (_config, sessionHandlers) => {
        captured.handlers = sessionHandlers;
        return ok(session);
      }),
    };

    let releaseFirst: () => void = () => {};
    const received: string[] = [];
    const onPayload = vi.fn(async (payload: Buffer) => {
      received.push(payload.toString());
      if (received.length === 1) {
        await new Promise<void>((resolve) => {
          releaseFirst = resolve;
        });
      }
    });

    const listener = createMqttAlarmListener({
      config: CONFIG,
      connector,
      onPayload,
      shutdown: signal,
    });
    const running = listener.run();
    await vi.waitFor(() => expect(session.subscribe).toHaveBeenCalled());

    expect(listener.isConnected()).toBe(false);
    const active = captured.handlers;
    active?.onPacket();
    expect(listener.isConnected()).toBe(true);

    active?.onMessage(CONFIG.topic, Buffer.from("first"));
    active?.onMessage(CONFIG.topic, Buffer.from("second"));
    await vi.waitFor(() => expect(onPayload).toHaveBeenCalledTimes(1));
    expect(received).toEqual(["first"]);

    releaseFirst();
    await vi.waitFor(() => expect(onPayload).toHaveBeenCalledTimes(2));
    expect(received).toEqual(["first", "second"]);

    signal.request();
    await running;

    expect(session.end).toHaveBeenCalledTimes(1);
    expect(listener.isConnected()).toBe(false);
    expect(connector.connect).toHaveBeenCalledTimes(1);
  });

  test("payloads still queued at shutdown are dropped", async () => {
    const { signal } = createRecordingShutdown(Number.POSITIVE_INFINITY);
    const session = createFakeSession();
    const captured: { handlers: SessionHandlers | null } = { handlers: null };
    const connector = {
      connect: vi.fn<BrokerConnector["connect"]>(async (_config, sessionHandlers) => {
        captured.handlers = sessionHandlers;
        return ok(session);
      }),
    };

    let releaseFirst: () => void = () => {};
    const onPayload = vi.fn(
      (_payload: Buffer) =>
        new Promise<void>((resolve) => {
          releaseFirst = resolve;
        }),
    );
    const listener = createMqttAlarmListener({
      config: CONFIG,
      connector,
      onPayload,
      shutdown: signal,
    });
    const running = listener.run();
    await vi.waitFor(() => expect(session.subscribe).toHaveBeenCalled());

    captured.handlers?.onMessage(CONFIG.topic, Buffer.from("first"));
    captured.handlers?.onMessage(CONFIG.topic, Buffer.from("second"));
    await vi.waitFor(() => expect(onPayload).toHaveBeenCalledTimes(1));

    signal.request();
    releaseFirst();
    await running;

    expect(onPayload).toHaveBeenCalledTimes(1);
  });

  test("shutdown interrupts a pending connect and ends the late session", async () => {
    const { signal, sleeps, activeListeners } = createRecordingShutdown(
      Number.POSITIVE_INFINITY,
    );
    const late = createFakeSession();
    let finishConnect: (result: Result<BrokerSession, MqttError>) => void = () => {};
    const connector = {
      connect: vi.fn<BrokerConnector["connect"]>(
        () =>
          new Promise<Result<BrokerSession, MqttError>>((resolve) => {
            finishConnect = resolve;
          }),
      ),
    };
    const listener = createMqttAlarmListener({
      config: CONFIG,
      connector,
      onPayload: vi.fn(async () => undefined),
      shutdown: signal,
    });
    const running = listener.run();
    await vi.waitFor(() => expect(connector.connect).toHaveBeenCalledTimes(1));

    signal.request();
    await running;
    expect(sleeps).toEqual([]);
    expect(activeListeners()).toBe(0);

    finishConnect(ok(late));
    await vi.waitFor(() => expect(late.end).toHaveBeenCalledTimes(1));
    expect(late.subscribe).not.toHaveBeenCalled();
  });

  test("shutdown interrupts a pending subscribe", async () => {
    const { signal } = createRecordingShutdown(Number.POSITIVE_INFINITY);
    const session = createFakeSession();
    session.subscribe.mockImplementation(
      () => new Promise<Result<void, MqttError>>(() => {}),
    );
    const connector = {
      connect: vi.fn<BrokerConnector["connect"]>(async () => ok(session)),
    };
    const listener = createMqttAlarmListener({
      config: CONFIG,
      connector,
      onPayload: vi.fn(async () => undefined),
      shutdown: signal,
    });
    const running = listener.run();
    await vi.waitFor(() => expect(session.subscribe).toHaveBeenCalled());

    signal.request();
    await running;

    expect(session.end).toHaveBeenCalledTimes(1);
  });

  test("a failing payload handler does not stop delivery", async () => {
    const { signal } = createRecordingShutdown(Number.POSITIVE_INFINITY);
    const session = createFakeSession();
    const connector = {
      connect: vi.fn<BrokerConnector["connect"]>(async (_config, sessionHandlers) => {
        sessionHandlers.onMessage(CONFIG.topic, Buffer.from("boom"));
        sessionHandlers.onMessage(CONFIG.topic, Buffer.from("ok"));
        return ok(session);
      }),
    };
    const onPayload = vi
      .fn(async (_payload: Buffer) => undefined)
      .mockRejectedValueOnce(new Error("handler failed"));

    const listener = createMqttAlarmListener({
      config: CONFIG,
      connector,
      onPayload,
      shutdown: signal,
    });
    const running = listener.run();

    await vi.waitFor(() => expect(onPayload).toHaveBeenCalledTimes(2));
    signal.request();
    await running;
  });
});
