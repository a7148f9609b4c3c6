/**
 * MQTT Module - Schemas and Types
 *
 * Connection settings and the broker seam used by the alarm listener.
 * The seam keeps mqtt.js behind an interface so the reconnection loop
 * can be driven by an in-process fake.
 */
import type { Result } from "neverthrow";

import type { RetryPolicy } from "../backoff.js";
import type { MqttError } from "./errors.js";

// =============================================================================
// Configuration
// =============================================================================

export type MqttConfig = Readonly<{
  host: string;
  port: number;
  /** Connect with mqtts:// and verify against caPath */
  useTls: boolean;
  caPath: string;
  clientId: string;
  username: string;
  password: string;
  /** Alarm RPC request topic, e.g. v1/devices/me/rpc/request/+ */
  topic: string;
  keepaliveSeconds: number;
  retry: RetryPolicy;
}>;

/**
 * QoS used for the alarm subscription (at least once).
 */
export const ALARM_SUBSCRIPTION_QOS = 1;

/**
 * SUBACK return code meaning the broker refused the subscription.
 */
export const SUBACK_FAILURE = 128;

// =============================================================================
// Broker Seam
// =============================================================================

export type SessionHandlers = Readonly<{
  /** An application message arrived */
  onMessage: (topic: string, payload: Buffer) => void;
  /** Any inbound packet arrived (drives the connectivity flag) */
  onPacket: () => void;
}>;

/**
 * A connected broker session.
 */
export type BrokerSession = Readonly<{
  subscribe: (topic: string) => Promise<Result<void, MqttError>>;
  /** Resolves once with the reason the stream ended */
  closed: Promise<MqttError>;
  /** Close the connection; safe to call more than once */
  end: () => Promise<void>;
}>;

export type BrokerConnector = Readonly<{
  connect: (
    config: MqttConfig,
    handlers: SessionHandlers,
  ) => Promise<Result<BrokerSession, MqttError>>;
}>;
