/**
 * Refrigerator Module - Schemas and Types
 *
 * The realtime feed carries a 6-element status vector, one bit per
 * monitored refrigerator (1 = temperature out of range).
 */

export const STATUS_VECTOR_LENGTH = 6;

export type StatusBit = 0 | 1;

/**
 * Refrigerator status vector, index-aligned with REFRIGERATOR_NAMES.
 */
export type StatusVector = ReadonlyArray<StatusBit>;

/**
 * Device names, index-aligned with the status vector.
 */
export const REFRIGERATOR_NAMES: ReadonlyArray<string> = [
  "Bodega - microbiología refri 2",
  "Bodega - microbiología refri 1",
  "Bodega - química refri 1",
  "Bodega - banco de sangre",
  "Bodega - química refri 2",
  "Bodega - Inmunología refri 1",
];

export const REFRIGERATOR_ALERT_DESCRIPTION =
  "Temperatura fuera de rango 2 - 8 °C";

export const INITIAL_STATUS_VECTOR: StatusVector = [0, 0, 0, 0, 0, 0];

/**
 * Format for device status timestamps.
 */
export const DEVICE_STATUS_DATE_FORMAT = "yyyy-MM-dd HH:mm:ss";

/**
 * Refrigerator configuration.
 */
export type RefrigeratorConfig = Readonly<{
  /** Fixed UTC offset for rendering commit timestamps, e.g. "-06:00" */
  utcOffset: string;
}>;

/**
 * Device status notification payload.
 */
export type DeviceStatusUpdate = Readonly<{
  timestamp: string;
  status: StatusBit[];
}>;

/**
 * A single bit change between two vectors.
 */
export type StatusTransition = Readonly<{
  index: number;
  direction: "raised" | "cleared";
}>;
