/**
 * Alerts Module - Schemas and Types
 *
 * Defines the Alert record and the alarm RPC envelope received over MQTT.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

// =============================================================================
// Alert
// =============================================================================

/**
 * Alert categories shown by the front end.
 */
export const AlertTypeSchema = z.enum(["disconnect", "tempUp", "tempDown"]);

export type AlertType = z.infer<typeof AlertTypeSchema>;

/**
 * A currently active alert.
 * Identity is `id`; `dateTime` is local time formatted as dd/MM/yyyy HH:mm:ss.
 */
export type Alert = Readonly<{
  id: string;
  dateTime: string;
  type: AlertType;
  device: string;
  description: string;
}>;

/**
 * Display format for alert timestamps.
 */
export const ALERT_DATE_FORMAT = "dd/MM/yyyy HH:mm:ss";

// =============================================================================
// Alarm RPC Envelope
// =============================================================================

/**
 * Alarm lifecycle statuses we act on. Anything else maps to UNKNOWN.
 */
export type AlarmStatus = "ACTIVE_UNACK" | "CLEARED_UNACK" | "UNKNOWN";

const AlarmStatusSchema = z
  .string()
  .transform((status): AlarmStatus =>
    status === "ACTIVE_UNACK" || status === "CLEARED_UNACK"
      ? status
      : "UNKNOWN",
  );

/**
 * Alarm parameters (camelCase on the wire).
 */
export const AlarmParamsSchema = z.object({
  id: z.object({
    id: z.string().describe("Alarm entity id"),
  }),
  createdTime: z.number().int().describe("Creation time in epoch millis"),
  type: z.string().describe("Alarm type, e.g. 'Temperature out of range'"),
  originatorName: z.string().describe("Device that raised the alarm"),
  status: AlarmStatusSchema,
  details: z
    .object({
      data: z.string().nullish(),
    })
    .nullish(),
});

export type AlarmParams = z.infer<typeof AlarmParamsSchema>;

/**
 * RPC request envelope.
 * Topic: v1/devices/me/rpc/request/+
 */
export const AlarmRpcEnvelopeSchema = z.object({
  method: z.string(),
  params: AlarmParamsSchema,
});

export type AlarmRpcEnvelope = z.infer<typeof AlarmRpcEnvelopeSchema>;

/**
 * Result of handling one RPC payload.
 */
export type AlarmOutcome =
  | Readonly<{ kind: "activated"; alert: Alert }>
  | Readonly<{ kind: "cleared"; id: string; removed: boolean }>
  | Readonly<{ kind: "ignored"; reason: "method" | "status" }>;

// =============================================================================
// Alarm Type Mapping
// =============================================================================

/**
 * How an alarm type string maps onto an alert.
 */
export type AlarmTypeMapping = Readonly<{
  type: AlertType;
  describe: (detailsData: string | null) => string;
}>;

/**
 * Known alarm types. Extend here to support new alarm kinds.
 */
export const ALARM_TYPE_MAPPINGS: ReadonlyMap<string, AlarmTypeMapping> =
  new Map<string, AlarmTypeMapping>([
    [
      "Temperature out of range",
      {
        type: "tempUp",
        describe: (detailsData) => detailsData ?? "Temperatura fuera de rango",
      },
    ],
    [
      "Inactivity TimeOut",
      {
        type: "disconnect",
        describe: () => "Dispositivo desconectado",
      },
    ],
  ]);

/**
 * Mapping used for any alarm type not in the table.
 */
export const DEFAULT_ALARM_TYPE_MAPPING: AlarmTypeMapping = {
  type: "tempUp",
  describe: () => "Detalle no disponible",
};
