/**
 * Connectivity Module - Service Layer
 *
 * Internet reachability probe: a plain TCP connect to a well-known host.
 */
import { Socket } from "node:net";

import { createLogger } from "../logger.js";
import type { ConnectivityConfig } from "./schema.js";

const log = createLogger("connectivity");

/**
 * Resolve true if a TCP connection to the probe target opens within the
 * timeout, false on error or timeout. Never rejects.
 */
export function checkInternetConnection(
  config: ConnectivityConfig,
): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = new Socket();

    const finish = (online: boolean, reason: string): void => {
      socket.destroy();
      log.debug(
        { host: config.host, port: config.port, online, reason },
        "Internet probe finished",
      );
      resolve(online);
    };

    socket.setTimeout(config.timeoutMs);
    socket.once("connect", () => finish(true, "connected"));
    socket.once("timeout", () => finish(false, "timeout"));
    socket.once("error", (error) => finish(false, error.message));

    socket.connect(config.port, config.host);
  });
}
