/**
 * MQTT Module - Service Layer
 *
 * Alarm listener: connect, subscribe, stream, back off, repeat until
 * shutdown. Messages are handed to the coordinator one at a time, in
 * arrival order.
 */
import { type Result, err, ok } from "neverthrow";

import { createBackoff } from "../backoff.js";
import { createLogger } from "../logger.js";
import { type ShutdownSignal, raceShutdown } from "../shutdown/index.js";
import type { MqttError } from "./errors.js";
import { formatMqttError } from "./errors.js";
import type { BrokerConnector, BrokerSession, MqttConfig } from "./schema.js";

const log = createLogger("mqtt");

export type MqttAlarmListener = Readonly<{
  /** Run the reconnection loop until shutdown is requested */
  run: () => Promise<void>;
  isConnected: () => boolean;
}>;

export type MqttAlarmListenerOptions = Readonly<{
  config: MqttConfig;
  connector: BrokerConnector;
  onPayload: (payload: Buffer) => Promise<unknown>;
  shutdown: ShutdownSignal;
}>;

type SessionEnd = "shutdown";

export function createMqttAlarmListener(
  options: MqttAlarmListenerOptions,
): MqttAlarmListener {
  const { config, connector, shutdown } = options;
  const backoff = createBackoff(config.retry);

  let connected = false;
  let delivery: Promise<void> = Promise.resolve();

  const deliver = (topic: string, payload: Buffer): void => {
    delivery = delivery
      .then(() => {
        if (shutdown.isRequested()) {
          log.debug({ topic }, "Dropping queued alarm payload after shutdown");
          return undefined;
        }
        return options.onPayload(payload);
      })
      .then(
        () => undefined,
        (error: unknown) => {
          log.error({ topic, error }, "Alarm payload handler failed");
        },
      );
  };

  /** A connect that lost the race against shutdown is ended once it lands */
  const discardLateSession = (
    connecting: Promise<Result<BrokerSession, MqttError>>,
  ): void => {
    connecting
      .then((late) => (late.isOk() ? late.value.end() : undefined))
      .catch((error: unknown) => {
        log.debug({ error }, "Late MQTT session cleanup failed");
      });
  };

  const runSession = async (): Promise<Result<SessionEnd, MqttError>> => {
    const connecting = connector.connect(config, {
      onMessage: (topic, payload) => {
        log.debug({ topic, bytes: payload.length }, "Alarm RPC received");
        deliver(topic, payload);
      },
      onPacket: () => {
        connected = !shutdown.isRequested();
      },
    });
    const opened = await raceShutdown(shutdown, connecting);
    if (opened.kind === "shutdown") {
      discardLateSession(connecting);
      return ok("shutdown");
    }
    if (opened.value.isErr()) {
      return err(opened.value.error);
    }

    const session = opened.value.value;
    const subscribed = await raceShutdown(shutdown, session.subscribe(config.topic));
    if (subscribed.kind === "shutdown") {
      await session.end();
      return ok("shutdown");
    }
    if (subscribed.value.isErr()) {
      await session.end();
      return err(subscribed.value.error);
    }

    log.info({ topic: config.topic }, "Subscribed to alarm topic");
    backoff.reset();

    const ended = await raceShutdown(shutdown, session.closed);
    await session.end();
    await delivery;

    return ended.kind === "shutdown" ? ok("shutdown") : err(ended.value);
  };

  const run = async (): Promise<void> => {
    while (!shutdown.isRequested()) {
      connected = false;
      const outcome = await runSession();
      connected = false;

      if (outcome.isOk() || shutdown.isRequested()) {
        break;
      }

      const delayMs = backoff.advance();
      log.warn(
        { error: formatMqttError(outcome.error), retryInMs: delayMs },
        "MQTT session failed, retrying",
      );
      await shutdown.sleep(delayMs);
    }

    log.info("MQTT listener stopped");
  };

  return {
    run,
    isConnected: () => connected,
  };
}
