/**
 * Realtime Module - Supabase Client
 *
 * supabase-js adapter behind the RealtimeConnector seam. Node 20 has no
 * global WebSocket, so the client is given the `ws` implementation.
 */
import {
  REALTIME_SUBSCRIBE_STATES,
  type SupabaseClient,
  createClient,
} from "@supabase/supabase-js";
import { type Result, err, ok } from "neverthrow";
import WebSocket from "ws";

import { createLogger } from "../logger.js";
import type { RealtimeError } from "./errors.js";
import { channelClosed, connectFailed, subscribeFailed } from "./errors.js";
import { createReceiveQueue } from "./queue.js";
import type {
  RealtimeConfig,
  RealtimeConnection,
  RealtimeConnector,
} from "./schema.js";

const log = createLogger("realtime");

const isSubscribed = (status: string): boolean =>
  status === REALTIME_SUBSCRIBE_STATES.SUBSCRIBED;

function openClient(config: RealtimeConfig): Result<SupabaseClient, RealtimeError> {
  try {
    return ok(
      createClient(config.url, config.apiKey, {
        auth: { persistSession: false, autoRefreshToken: false },
        realtime: { transport: WebSocket },
      }),
    );
  } catch (error) {
    return err(
      connectFailed(error instanceof Error ? error.message : String(error)),
    );
  }
}

function createConnection(
  client: SupabaseClient,
  config: RealtimeConfig,
): RealtimeConnection {
  const queue = createReceiveQueue();

  const subscribe = (): Promise<Result<void, RealtimeError>> =>
    new Promise((resolve) => {
      let settled = false;

      client
        .channel(config.channel)
        .on(
          "postgres_changes",
          { event: "UPDATE", schema: config.schema },
          (payload) => queue.push(payload),
        )
        .subscribe((status, error) => {
          const message = error?.message ?? status;

          if (isSubscribed(status)) {
            log.info(
              { channel: config.channel, schema: config.schema },
              "Subscribed to database changes",
            );
            if (!settled) {
              settled = true;
              resolve(ok(undefined));
            }
            return;
          }

          log.warn({ status, message }, "Realtime channel state changed");
          if (!settled) {
            settled = true;
            resolve(err(subscribeFailed(status, message)));
          }
          queue.close(channelClosed(message));
        });
    });

  const close = async (): Promise<void> => {
    queue.close(channelClosed("Closed locally"));
    try {
      await client.removeAllChannels();
    } catch (error) {
      log.debug({ error }, "Realtime channel removal failed");
    }
  };

  return {
    subscribe,
    next: (timeoutMs) => queue.next(timeoutMs),
    close,
  };
}

/**
 * Connector backed by supabase-js.
 */
export function createSupabaseConnector(): RealtimeConnector {
  return {
    connect: async (config) => {
      log.info({ url: config.url }, "Connecting to Supabase realtime...");
      const client = openClient(config);
      if (client.isErr()) {
        return err(client.error);
      }
      return ok(createConnection(client.value, config));
    },
  };
}
