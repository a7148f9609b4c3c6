/**
 * Buzzer Module - Error Types
 *
 * Typed error unions for GPIO commands.
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur while running GPIO commands.
 */
export type BuzzerError =
  | {
      readonly type: "LAUNCH_FAILED";
      readonly command: string;
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "COMMAND_FAILED";
      readonly command: string;
      readonly exitCode: number | null;
      readonly stderr: string;
    }
  | {
      readonly type: "MALFORMED_OUTPUT";
      readonly command: string;
      readonly output: string;
    };

/**
 * Create a LAUNCH_FAILED error.
 */
export function launchFailed(
  command: string,
  message: string,
  cause?: Error,
): BuzzerError {
  if (cause) {
    return { type: "LAUNCH_FAILED", command, message, cause };
  }
  return { type: "LAUNCH_FAILED", command, message };
}

/**
 * Create a COMMAND_FAILED error.
 */
export function commandFailed(
  command: string,
  exitCode: number | null,
  stderr: string,
): BuzzerError {
  return { type: "COMMAND_FAILED", command, exitCode, stderr };
}

/**
 * Create a MALFORMED_OUTPUT error.
 */
export function malformedOutput(command: string, output: string): BuzzerError {
  return { type: "MALFORMED_OUTPUT", command, output };
}

/**
 * Format a BuzzerError for logging.
 */
export function formatBuzzerError(error: BuzzerError): string {
  switch (error.type) {
    case "LAUNCH_FAILED":
      return `Could not run ${error.command}: ${error.message}`;
    case "COMMAND_FAILED":
      return `${error.command} exited with code ${error.exitCode ?? "?"}: ${error.stderr.trim()}`;
    case "MALFORMED_OUTPUT":
      return `${error.command} returned unexpected output: "${error.output.trim()}"`;
  }
}
