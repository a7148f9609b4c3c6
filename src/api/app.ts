/**
 * Hono application: request tracing, global error handling and routes.
 */
import { Hono } from "hono";

import type { MonitoringStation } from "../monitoring/index.js";
import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { createRoutes } from "./routes.js";

export function createApp(station: MonitoringStation): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.route("/", createRoutes(station));

  return app;
}
