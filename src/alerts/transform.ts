/**
 * Alerts Module - Pure Transformations
 *
 * Pure functions for decoding alarm envelopes and building alerts.
 * No side effects, no I/O - just data in, data out.
 */
import { format, isValid } from "date-fns";
import { type Result, err, ok } from "neverthrow";

import type { AlarmPayloadError } from "./errors.js";
import { invalidJson, validationFailed } from "./errors.js";
import type {
  AlarmParams,
  AlarmRpcEnvelope,
  AlarmTypeMapping,
  Alert,
} from "./schema.js";
import {
  ALARM_TYPE_MAPPINGS,
  ALERT_DATE_FORMAT,
  AlarmRpcEnvelopeSchema,
  DEFAULT_ALARM_TYPE_MAPPING,
} from "./schema.js";

// =============================================================================
// Envelope Decoding
// =============================================================================

/**
 * Decode a raw MQTT payload into an alarm RPC envelope.
 *
 * @param payload - Raw message payload (Buffer or string)
 */
export function parseAlarmEnvelope(
  payload: Buffer | string,
): Result<AlarmRpcEnvelope, AlarmPayloadError> {
  const text = typeof payload === "string" ? payload : payload.toString("utf8");

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    return err(invalidJson(error instanceof Error ? error.message : String(error)));
  }

  const parsed = AlarmRpcEnvelopeSchema.safeParse(data);
  if (!parsed.success) {
    return err(validationFailed(parsed.error.issues));
  }

  return ok(parsed.data);
}

/**
 * Check whether an RPC method names an alarm (case-insensitive).
 */
export function isAlarmMethod(method: string): boolean {
  return method.toUpperCase() === "ALARM";
}

// =============================================================================
// Alert Construction
// =============================================================================

/**
 * Format an epoch-millis timestamp as local alert time.
 * Falls back to `now` when the timestamp is out of range.
 */
export function formatAlertTimestamp(epochMs: number, now: number): string {
  const date = new Date(epochMs);
  return format(isValid(date) ? date : new Date(now), ALERT_DATE_FORMAT);
}

/**
 * Look up how an alarm type string maps onto an alert.
 */
export function resolveAlarmType(alarmType: string): AlarmTypeMapping {
  return ALARM_TYPE_MAPPINGS.get(alarmType) ?? DEFAULT_ALARM_TYPE_MAPPING;
}

/**
 * Build an alert from activated alarm parameters.
 */
export function alertFromAlarm(params: AlarmParams, now: number): Alert {
  const mapping = resolveAlarmType(params.type);
  return {
    id: params.id.id,
    dateTime: formatAlertTimestamp(params.createdTime, now),
    type: mapping.type,
    device: params.originatorName,
    description: mapping.describe(params.details?.data ?? null),
  };
}
