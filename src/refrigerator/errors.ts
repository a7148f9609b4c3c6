/**
 * Refrigerator Module - Error Types
 *
 * Validation errors for incoming status vectors.
 */

export type RefrigeratorError =
  | {
      readonly type: "INVALID_JSON";
      readonly message: string;
    }
  | {
      readonly type: "NOT_AN_ARRAY";
      readonly received: string;
    }
  | {
      readonly type: "WRONG_LENGTH";
      readonly expected: number;
      readonly actual: number;
    }
  | {
      readonly type: "INVALID_VALUE";
      readonly index: number;
      readonly value: unknown;
    };

/**
 * Create an INVALID_JSON error.
 */
export function invalidJson(message: string): RefrigeratorError {
  return { type: "INVALID_JSON", message };
}

/**
 * Create a NOT_AN_ARRAY error.
 */
export function notAnArray(received: string): RefrigeratorError {
  return { type: "NOT_AN_ARRAY", received };
}

/**
 * Create a WRONG_LENGTH error.
 */
export function wrongLength(expected: number, actual: number): RefrigeratorError {
  return { type: "WRONG_LENGTH", expected, actual };
}

/**
 * Create an INVALID_VALUE error.
 */
export function invalidValue(index: number, value: unknown): RefrigeratorError {
  return { type: "INVALID_VALUE", index, value };
}

/**
 * Format a RefrigeratorError for logging.
 */
export function formatRefrigeratorError(error: RefrigeratorError): string {
  switch (error.type) {
    case "INVALID_JSON":
      return `Invalid JSON: ${error.message}`;
    case "NOT_AN_ARRAY":
      return `Expected a JSON array, got ${error.received}`;
    case "WRONG_LENGTH":
      return `Expected exactly ${error.expected} elements, got ${error.actual}`;
    case "INVALID_VALUE":
      return `Element at index ${error.index} is ${JSON.stringify(error.value)}, must be 0 or 1`;
  }
}
