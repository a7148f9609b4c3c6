/**
 * Alerts Module - Error Types
 *
 * Typed error unions for alarm payload handling.
 * Errors are values, not exceptions.
 */
import type { ZodIssue } from "zod";

/**
 * Errors that can occur while decoding an alarm RPC payload.
 */
export type AlarmPayloadError =
  | {
      readonly type: "INVALID_JSON";
      readonly message: string;
    }
  | {
      readonly type: "VALIDATION_FAILED";
      readonly issues: ReadonlyArray<ZodIssue>;
    };

/**
 * Create an INVALID_JSON error.
 */
export function invalidJson(message: string): AlarmPayloadError {
  return { type: "INVALID_JSON", message };
}

/**
 * Create a VALIDATION_FAILED error.
 */
export function validationFailed(
  issues: ReadonlyArray<ZodIssue>,
): AlarmPayloadError {
  return { type: "VALIDATION_FAILED", issues };
}

/**
 * Format an AlarmPayloadError for logging.
 */
export function formatAlarmPayloadError(error: AlarmPayloadError): string {
  switch (error.type) {
    case "INVALID_JSON":
      return `Invalid JSON: ${error.message}`;
    case "VALIDATION_FAILED":
      return `Invalid alarm envelope: ${error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ")}`;
  }
}
