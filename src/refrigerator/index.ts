/**
 * Refrigerator Module - Public API
 */

// Types
export type {
  DeviceStatusUpdate,
  RefrigeratorConfig,
  StatusBit,
  StatusTransition,
  StatusVector,
} from "./schema.js";
export {
  INITIAL_STATUS_VECTOR,
  REFRIGERATOR_ALERT_DESCRIPTION,
  REFRIGERATOR_NAMES,
  STATUS_VECTOR_LENGTH,
} from "./schema.js";
export type { RefrigeratorError } from "./errors.js";
export { formatRefrigeratorError } from "./errors.js";

// Service
export type {
  RefrigeratorMonitor,
  RefrigeratorMonitorOptions,
} from "./service.js";
export { createRefrigeratorMonitor } from "./service.js";

// Pure transformations (for testing)
export {
  diffStatusVectors,
  formatCommitTimestamp,
  parseStatusVector,
  refrigeratorAlert,
  refrigeratorAlertId,
} from "./transform.js";
