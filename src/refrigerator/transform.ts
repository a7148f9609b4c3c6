/**
 * Refrigerator Module - Pure Transformations
 *
 * Validation, timestamp rendering and edge detection for status vectors.
 */
import { tz } from "@date-fns/tz";
import { format, isValid, parseISO } from "date-fns";
import { type Result, err, ok } from "neverthrow";

import { ALERT_DATE_FORMAT, type Alert } from "../alerts/index.js";
import type { RefrigeratorError } from "./errors.js";
import { invalidJson, invalidValue, notAnArray, wrongLength } from "./errors.js";
import type { StatusBit, StatusTransition, StatusVector } from "./schema.js";
import {
  DEVICE_STATUS_DATE_FORMAT,
  REFRIGERATOR_ALERT_DESCRIPTION,
  REFRIGERATOR_NAMES,
  STATUS_VECTOR_LENGTH,
} from "./schema.js";

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate a status message: a JSON array of exactly 6 values, each 0 or 1.
 */
export function parseStatusVector(
  message: string,
): Result<StatusBit[], RefrigeratorError> {
  let data: unknown;
  try {
    data = JSON.parse(message);
  } catch (error) {
    return err(invalidJson(error instanceof Error ? error.message : String(error)));
  }

  if (!Array.isArray(data)) {
    return err(notAnArray(data === null ? "null" : typeof data));
  }

  if (data.length !== STATUS_VECTOR_LENGTH) {
    return err(wrongLength(STATUS_VECTOR_LENGTH, data.length));
  }

  const values: unknown[] = data;
  const bits: StatusBit[] = [];
  for (const [index, value] of values.entries()) {
    if (value === 0 || value === 1) {
      bits.push(value);
      continue;
    }
    return err(invalidValue(index, value));
  }

  return ok(bits);
}

// =============================================================================
// Timestamps
// =============================================================================

/**
 * Commit timestamps must carry a time of day followed by `Z` or an offset.
 */
const UTC_DESIGNATOR = /\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Render a commit timestamp at a fixed UTC offset.
 * Falls back to `now` in local time when the timestamp does not parse
 * or has no zone designator.
 *
 * @example formatCommitTimestamp("2025-03-01T18:30:00Z", "-06:00", now) // "2025-03-01 12:30:00"
 */
export function formatCommitTimestamp(
  commitTimestamp: string,
  utcOffset: string,
  now: number,
): string {
  const parsed = parseISO(commitTimestamp);
  if (!UTC_DESIGNATOR.test(commitTimestamp) || !isValid(parsed)) {
    return format(new Date(now), DEVICE_STATUS_DATE_FORMAT);
  }
  return format(parsed, DEVICE_STATUS_DATE_FORMAT, { in: tz(utcOffset) });
}

// =============================================================================
// Edge Detection
// =============================================================================

/**
 * List the bits that changed between two vectors.
 */
export function diffStatusVectors(
  previous: StatusVector,
  next: StatusVector,
): StatusTransition[] {
  const transitions: StatusTransition[] = [];
  const length = Math.min(previous.length, next.length, REFRIGERATOR_NAMES.length);

  for (let index = 0; index < length; index++) {
    const before = previous[index];
    const after = next[index];
    if (before === after) {
      continue;
    }
    transitions.push({ index, direction: after === 1 ? "raised" : "cleared" });
  }

  return transitions;
}

/**
 * Alert id for a refrigerator slot.
 */
export function refrigeratorAlertId(index: number): string {
  return `refrigerator-temp-${index}`;
}

/**
 * Build the synthetic alert raised when a refrigerator goes out of range.
 */
export function refrigeratorAlert(index: number, now: number): Alert {
  return {
    id: refrigeratorAlertId(index),
    dateTime: format(new Date(now), ALERT_DATE_FORMAT),
    type: "tempUp",
    device: REFRIGERATOR_NAMES[index] ?? `Refrigerador ${index}`,
    description: REFRIGERATOR_ALERT_DESCRIPTION,
  };
}
