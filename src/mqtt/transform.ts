/**
 * MQTT Module - Pure Transformations
 *
 * Broker URL and client options derived from configuration.
 */
import type { IClientOptions } from "mqtt";

import type { MqttConfig } from "./schema.js";
import { SUBACK_FAILURE } from "./schema.js";

/**
 * Broker URL, mqtts:// when TLS is enabled.
 */
export function brokerUrl(config: MqttConfig): string {
  const protocol = config.useTls ? "mqtts" : "mqtt";
  return `${protocol}://${config.host}:${config.port}`;
}

/**
 * mqtt.js client options.
 * Automatic reconnects are disabled; the listener owns the retry loop.
 *
 * @param ca - CA bundle contents, required when TLS is enabled
 */
export function buildClientOptions(
  config: MqttConfig,
  ca: Buffer | null,
): IClientOptions {
  const options: IClientOptions = {
    clientId: config.clientId,
    keepalive: config.keepaliveSeconds,
    reconnectPeriod: 0,
    clean: true,
  };

  if (config.username !== "") {
    options.username = config.username;
    options.password = config.password;
  }

  if (config.useTls && ca) {
    options.ca = ca;
    options.ALPNProtocols = ["mqtt"];
    options.rejectUnauthorized = true;
  }

  return options;
}

/**
 * True if any SUBACK grant was refused by the broker.
 */
export function hasRejectedGrant(
  grants: ReadonlyArray<{ qos: number }>,
): boolean {
  return grants.some((grant) => grant.qos === SUBACK_FAILURE);
}
