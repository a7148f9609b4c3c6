/**
 * Alarm Station - Application Entry Point
 *
 * Sets up the Hono server with:
 * - Alert, mute and connectivity routes
 * - SSE for real-time updates
 * - Request ID tracing
 * - Global error handling
 * - The monitoring station (MQTT alarms, realtime status vector, buzzer)
 */
import { serve } from "@hono/node-server";

import { createApp } from "./api/app.js";
import { config, getStationSettings } from "./config.js";
import { createLogger } from "./logger.js";
import { createMonitoringStation } from "./monitoring/index.js";

const log = createLogger("api");

// =============================================================================
// APPLICATION STARTUP BANNER
// =============================================================================

console.log("");
console.log("========================================");
console.log("  REFRIGERATOR ALARM STATION");
console.log("========================================");
console.log("");

const settings = getStationSettings();

// Log configuration summary (non-sensitive values only)
log.info(
  {
    port: config.PORT,
    env: config.NODE_ENV,
    mqttBroker: `${settings.mqtt.host}:${settings.mqtt.port}`,
    mqttTls: settings.mqtt.useTls,
    mqttTopic: settings.mqtt.topic,
    muteDurationMs: settings.mute.durationMs,
    buzzerEnabled: settings.buzzer.enabled,
    deviceStatusOffset: settings.refrigerator.utcOffset,
  },
  "Configuration loaded",
);

if (settings.realtime) {
  log.info(
    { url: settings.realtime.url, channel: settings.realtime.channel },
    "Supabase realtime: ENABLED",
  );
} else {
  log.info("Supabase realtime: DISABLED");
}

console.log("");

// =============================================================================
// START STATION AND SERVER
// =============================================================================

const station = createMonitoringStation(settings);
station.start();

const server = serve(
  {
    fetch: createApp(station).fetch,
    port: config.PORT,
    hostname: "0.0.0.0",
  },
  (info) => {
    log.info(
      { port: info.port, env: config.NODE_ENV, appName: config.APP_NAME },
      `🚀 ${config.APP_NAME} listening on port ${info.port}`,
    );
  },
);

// =============================================================================
// GRACEFUL SHUTDOWN
// =============================================================================

const shutdown = async (signal: string): Promise<void> => {
  log.info({ signal }, `${signal} received. Shutting down gracefully...`);

  await station.stop();
  server.close();

  log.info("Shutdown complete");
  process.exit(0);
};

const onSignal = (signal: string): void => {
  shutdown(signal).catch((error: unknown) => {
    log.fatal({ error }, "Shutdown failed");
    process.exit(1);
  });
};

process.once("SIGTERM", () => onSignal("SIGTERM"));
process.once("SIGINT", () => onSignal("SIGINT"));
