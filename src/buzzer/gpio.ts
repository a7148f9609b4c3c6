/**
 * Buzzer Module - GPIO Command Runner
 *
 * Runs gpiofind / gpioset as child processes.
 */
import { execFile } from "node:child_process";
import { type Result, err, ok } from "neverthrow";

import type { BuzzerError } from "./errors.js";
import { commandFailed, launchFailed } from "./errors.js";
import type { GpioRunner } from "./schema.js";
import { gpiosetArgs, parseGpiofindOutput } from "./transform.js";

const COMMAND_TIMEOUT_MS = 5000;

/**
 * Run a command and capture stdout.
 * Spawn errors (ENOENT, EACCES) carry a string code; exit failures a number.
 */
function runCommand(
  command: string,
  args: string[],
): Promise<Result<string, BuzzerError>> {
  return new Promise((resolve) => {
    execFile(
      command,
      args,
      { timeout: COMMAND_TIMEOUT_MS },
      (error, stdout, stderr) => {
        if (!error) {
          resolve(ok(stdout));
          return;
        }

        if (typeof error.code === "string") {
          resolve(err(launchFailed(command, error.message, error)));
          return;
        }

        resolve(err(commandFailed(command, error.code ?? null, stderr)));
      },
    );
  });
}

/**
 * Create the libgpiod-backed runner.
 */
export function createGpioCommandRunner(): GpioRunner {
  return {
    find: async (lineName) => {
      const result = await runCommand("gpiofind", [lineName]);
      return result.andThen(parseGpiofindOutput);
    },
    set: async (line, level) => {
      const result = await runCommand("gpioset", gpiosetArgs(line, level));
      return result.map(() => undefined);
    },
  };
}
