/**
 * MQTT Module - Public API
 */

// Types
export type {
  BrokerConnector,
  BrokerSession,
  MqttConfig,
  SessionHandlers,
} from "./schema.js";
export { ALARM_SUBSCRIPTION_QOS, SUBACK_FAILURE } from "./schema.js";

// Errors
export type { MqttError } from "./errors.js";
export {
  connectFailed,
  formatMqttError,
  streamEnded,
  subscribeFailed,
  tlsMaterialUnavailable,
} from "./errors.js";

// Broker client
export { createMqttConnector } from "./client.js";

// Service
export type { MqttAlarmListener, MqttAlarmListenerOptions } from "./service.js";
export { createMqttAlarmListener } from "./service.js";

// Pure transformations (for testing)
export { brokerUrl, buildClientOptions, hasRejectedGrant } from "./transform.js";
