/**
 * Alerts Module - Public API
 */

// Types
export type {
  AlarmOutcome,
  AlarmParams,
  AlarmRpcEnvelope,
  AlarmStatus,
  AlarmTypeMapping,
  Alert,
  AlertType,
} from "./schema.js";
export {
  ALARM_TYPE_MAPPINGS,
  ALERT_DATE_FORMAT,
  AlarmRpcEnvelopeSchema,
  AlertTypeSchema,
  DEFAULT_ALARM_TYPE_MAPPING,
} from "./schema.js";

// Errors
export type { AlarmPayloadError } from "./errors.js";
export { formatAlarmPayloadError } from "./errors.js";

// Store
export type { AlertStore } from "./store.js";
export { createAlertStore } from "./store.js";

// Service
export type { AlertCoordinator, AlertCoordinatorOptions } from "./service.js";
export { createAlertCoordinator } from "./service.js";

// Pure transformations (for testing)
export {
  alertFromAlarm,
  formatAlertTimestamp,
  isAlarmMethod,
  parseAlarmEnvelope,
  resolveAlarmType,
} from "./transform.js";
