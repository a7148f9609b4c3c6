/**
 * API routes for the Alarm Station.
 *
 * Routes are organized by domain:
 * - /api/health - Health check
 * - /api/alerts/* - Active alerts
 * - /api/mute/* - Mute window
 * - /api/connectivity/* - Connection flags and internet probe
 * - /api/events - SSE stream for real-time updates
 */
import { Hono } from "hono";

import { config } from "../config.js";
import { createLogger } from "../logger.js";
import type { MonitoringStation } from "../monitoring/index.js";
import { getClientCount, openEventStream } from "../sse/index.js";

const log = createLogger("api");

/**
 * Build the router over a running station.
 */
export function createRoutes(station: MonitoringStation): Hono {
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      requestId,
      version: "1.0.0",
      appName: config.APP_NAME,
      station: station.getPhase(),
      connectivity: station.getConnectivity(),
      realtimeEnabled: station.isRealtimeEnabled(),
      activeAlerts: station.getActiveAlerts().length,
      sseClients: getClientCount(),
    });
  });

  // ===========================================================================
  // Alerts
  // ===========================================================================

  routes.get("/api/alerts", (c) => {
    return c.json(station.getActiveAlerts());
  });

  routes.delete("/api/alerts/:id", async (c) => {
    const requestId = c.get("requestId");
    const id = c.req.param("id");
    log.info({ requestId, id }, "DELETE /api/alerts/:id");

    const removed = await station.removeAlert(id);
    return c.json({ removed });
  });

  // ===========================================================================
  // Mute
  // ===========================================================================

  routes.get("/api/mute", (c) => {
    return c.json(station.getMuteStatus());
  });

  routes.post("/api/mute/toggle", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "POST /api/mute/toggle");

    return c.json(await station.toggleMute());
  });

  // ===========================================================================
  // Connectivity
  // ===========================================================================

  routes.get("/api/connectivity", (c) => {
    return c.json(station.getConnectivity());
  });

  routes.get("/api/connectivity/internet", async (c) => {
    const online = await station.checkInternetConnection();
    return c.json({ online });
  });

  // ===========================================================================
  // Server-Sent Events
  // ===========================================================================

  routes.get("/api/events", (c) => {
    const requestId = c.get("requestId");
    // Late joiners need the current mute window
    const { stream, clientId } = openEventStream([
      { type: "mute_changed", ...station.getMuteStatus() },
    ]);
    log.info({ requestId, clientId }, "GET /api/events");

    return new Response(stream, {
      headers: {
        "Content-Type": "text/event-stream",
        "Cache-Control": "no-cache",
        Connection: "keep-alive",
      },
    });
  });

  return routes;
}
