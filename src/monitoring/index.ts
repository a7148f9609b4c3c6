/**
 * Monitoring Module - Public API
 */
export type {
  StationOverrides,
  StationPhase,
  StationSettings,
} from "./schema.js";
export type { MonitoringStation } from "./service.js";
export { createMonitoringStation } from "./service.js";
