/**
 * Realtime Module - Service Layer
 *
 * Status vector listener: connect, subscribe, receive with a poll
 * timeout, back off on failure, repeat until shutdown. Each change is
 * handled to completion before the next one is read.
 */
import { type Result, err, ok } from "neverthrow";

import { createBackoff } from "../backoff.js";
import { createLogger } from "../logger.js";
import { type ShutdownSignal, raceShutdown } from "../shutdown/index.js";
import type { RealtimeError } from "./errors.js";
import { formatRealtimeError } from "./errors.js";
import type {
  RealtimeConfig,
  RealtimeConnection,
  RealtimeConnector,
} from "./schema.js";
import { decodeChange } from "./transform.js";

const log = createLogger("realtime");

export type RealtimeListener = Readonly<{
  run: () => Promise<void>;
  isConnected: () => boolean;
}>;

export type RealtimeListenerOptions = Readonly<{
  config: RealtimeConfig;
  connector: RealtimeConnector;
  onStatusVector: (message: string, commitTimestamp: string) => Promise<unknown>;
  shutdown: ShutdownSignal;
}>;

type SessionEnd = "shutdown";

export function createRealtimeListener(
  options: RealtimeListenerOptions,
): RealtimeListener {
  const { config, connector, shutdown } = options;
  const backoff = createBackoff(config.retry);

  let connected = false;

  const handleChange = async (payload: unknown): Promise<void> => {
    const change = decodeChange(payload);
    if (change.isErr()) {
      log.debug({ reason: change.error }, "Ignoring undecodable change");
      return;
    }

    try {
      await options.onStatusVector(
        change.value.new.message,
        change.value.commit_timestamp,
      );
    } catch (error) {
      log.error({ error }, "Status vector handler failed");
    }
  };

  const stream = async (
    connection: RealtimeConnection,
  ): Promise<Result<SessionEnd, RealtimeError>> => {
    while (!shutdown.isRequested()) {
      const raced = await raceShutdown(
        shutdown,
        connection.next(config.pollTimeoutMs),
      );
      if (raced.kind === "shutdown") {
        break;
      }

      const received = raced.value;
      switch (received.kind) {
        case "change":
          await handleChange(received.payload);
          break;
        case "timeout":
          break;
        case "closed":
          return err(received.error);
      }
    }
    return ok("shutdown");
  };

  const runSession = async (): Promise<Result<SessionEnd, RealtimeError>> => {
    const opened = await connector.connect(config);
    if (opened.isErr()) {
      return err(opened.error);
    }

    const connection = opened.value;
    connected = true;

    const subscribed = await raceShutdown(shutdown, connection.subscribe());
    if (subscribed.kind === "shutdown") {
      await connection.close();
      return ok("shutdown");
    }
    if (subscribed.value.isErr()) {
      await connection.close();
      return err(subscribed.value.error);
    }
    backoff.reset();

    const ended = await stream(connection);
    await connection.close();
    return ended;
  };

  const run = async (): Promise<void> => {
    while (!shutdown.isRequested()) {
      const outcome = await runSession();
      connected = false;

      if (outcome.isOk() || shutdown.isRequested()) {
        break;
      }

      const delayMs = backoff.advance();
      log.warn(
        { error: formatRealtimeError(outcome.error), retryInMs: delayMs },
        "Realtime session failed, retrying",
      );
      await shutdown.sleep(delayMs);
    }

    log.info("Realtime listener stopped");
  };

  return {
    run,
    isConnected: () => connected,
  };
}
