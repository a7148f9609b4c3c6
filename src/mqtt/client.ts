/**
 * MQTT Module - Broker Client
 *
 * mqtt.js adapter behind the BrokerConnector seam.
 */
import { readFile } from "node:fs/promises";

import mqtt from "mqtt";
import type { MqttClient } from "mqtt";
import { type Result, ResultAsync, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { MqttError } from "./errors.js";
import {
  connectFailed,
  streamEnded,
  subscribeFailed,
  tlsMaterialUnavailable,
} from "./errors.js";
import type {
  BrokerConnector,
  BrokerSession,
  MqttConfig,
  SessionHandlers,
} from "./schema.js";
import { ALARM_SUBSCRIPTION_QOS } from "./schema.js";
import { brokerUrl, buildClientOptions, hasRejectedGrant } from "./transform.js";

const log = createLogger("mqtt");

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

function readCaBundle(path: string): ResultAsync<Buffer, MqttError> {
  return ResultAsync.fromPromise(readFile(path), (error) =>
    tlsMaterialUnavailable(path, errorMessage(error)),
  );
}

/**
 * Wait for CONNACK, or the first error/close before it.
 */
function waitForConnect(client: MqttClient): Promise<Result<void, MqttError>> {
  return new Promise((resolve) => {
    const cleanup = (): void => {
      client.off("connect", onConnect);
      client.off("error", onError);
      client.off("close", onClose);
    };
    const onConnect = (): void => {
      cleanup();
      resolve(ok(undefined));
    };
    const onError = (error: Error): void => {
      cleanup();
      resolve(err(connectFailed(error.message)));
    };
    const onClose = (): void => {
      cleanup();
      resolve(err(connectFailed("Connection closed before CONNACK")));
    };

    client.once("connect", onConnect);
    client.once("error", onError);
    client.once("close", onClose);
  });
}

function createSession(client: MqttClient): BrokerSession {
  let lastError: string | null = null;

  client.on("error", (error) => {
    lastError = error.message;
  });

  const closed = new Promise<MqttError>((resolve) => {
    client.once("close", () => {
      resolve(streamEnded(lastError ?? "Connection closed by broker"));
    });
  });

  const subscribe = async (topic: string): Promise<Result<void, MqttError>> => {
    const granted = await ResultAsync.fromPromise(
      client.subscribeAsync(topic, { qos: ALARM_SUBSCRIPTION_QOS }),
      (error) => subscribeFailed(topic, errorMessage(error)),
    );
    if (granted.isErr()) {
      return err(granted.error);
    }
    if (hasRejectedGrant(granted.value)) {
      return err(subscribeFailed(topic, "Broker rejected the subscription"));
    }
    return ok(undefined);
  };

  const end = async (): Promise<void> => {
    if (client.disconnected) {
      return;
    }
    try {
      await client.endAsync(true);
    } catch (error) {
      log.debug({ error: errorMessage(error) }, "MQTT client end failed");
    }
  };

  return { subscribe, closed, end };
}

/**
 * Connector that opens real broker sessions with mqtt.js.
 */
export function createMqttConnector(): BrokerConnector {
  const connect = async (
    config: MqttConfig,
    handlers: SessionHandlers,
  ): Promise<Result<BrokerSession, MqttError>> => {
    let ca: Buffer | null = null;
    if (config.useTls) {
      const bundle = await readCaBundle(config.caPath);
      if (bundle.isErr()) {
        return err(bundle.error);
      }
      ca = bundle.value;
    }

    const url = brokerUrl(config);
    log.info({ url, clientId: config.clientId }, "Connecting to MQTT broker...");

    const client = mqtt.connect(url, buildClientOptions(config, ca));
    client.on("error", (error) => {
      log.debug({ error: error.message }, "MQTT client error event");
    });
    client.on("packetreceive", () => handlers.onPacket());
    client.on("message", (topic, payload) => handlers.onMessage(topic, payload));

    const connected = await waitForConnect(client);
    if (connected.isErr()) {
      client.end(true);
      return err(connected.error);
    }

    log.info({ url }, "Connected to MQTT broker");
    return ok(createSession(client));
  };

  return { connect };
}
