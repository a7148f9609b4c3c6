/**
 * Last-resort error boundary for the command surface.
 */
import type { ErrorHandler } from "hono";

import { config } from "../config.js";
import { createLogger } from "../logger.js";

const log = createLogger("api");

/**
 * Log the failure and answer with JSON 500. Station state is left as it
 * was; the front end can retry the command or re-read the state.
 * Error messages are hidden in production.
 */
export const errorHandler: ErrorHandler = (error, c) => {
  const requestId = c.get("requestId") ?? "unknown";

  log.error(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      error: error.message,
      stack: error.stack,
    },
    "Station command failed",
  );

  return c.json(
    {
      error:
        config.NODE_ENV === "production" ? "Internal server error" : error.message,
      requestId,
    },
    500,
  );
};
