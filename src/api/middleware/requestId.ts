/**
 * Tags every front-end command with a request id.
 *
 * The id comes from `x-request-id` when the caller sends one, and is
 * echoed back on the response and in the route logs.
 */
import { randomUUID } from "node:crypto";

import type { MiddlewareHandler } from "hono";
import { createLogger } from "../../logger.js";

const log = createLogger("middleware");

export const requestIdMiddleware: MiddlewareHandler = async (c, next) => {
  const requestId = c.req.header("x-request-id") ?? randomUUID();
  c.set("requestId", requestId);
  c.header("x-request-id", requestId);

  const startedAt = Date.now();
  await next();

  log.debug(
    {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - startedAt,
    },
    "Command handled",
  );
};

declare module "hono" {
  interface ContextVariableMap {
    requestId: string;
  }
}
