/**
 * Typed configuration - all config lives in .env, parsed with Zod at startup.
 * App crashes immediately on invalid config - fail fast.
 *
 * Alarm Station configuration covering:
 * - Server settings
 * - MQTT broker (alarm RPC requests)
 * - Mute window and buzzer
 * - Supabase realtime (refrigerator status vector)
 * - Connectivity probe
 */
import "dotenv/config";
import { z } from "zod";

import type { BuzzerConfig } from "./buzzer/index.js";
import type { ConnectivityConfig } from "./connectivity/index.js";
import type { StationSettings } from "./monitoring/index.js";
import type { MqttConfig } from "./mqtt/index.js";
import type { MuteConfig } from "./mute/index.js";
import type { RealtimeConfig } from "./realtime/index.js";
import type { RefrigeratorConfig } from "./refrigerator/index.js";

/**
 * Custom boolean parser for environment variables.
 * z.coerce.boolean() doesn't work with string "false" (it's truthy).
 */
const envBoolean = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined ? defaultValue : val.toLowerCase() === "true",
    );

/**
 * Parse optional string - empty string becomes undefined
 */
const optionalString = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

const ConfigSchema = z.object({
  // ==========================================================================
  // Server Configuration
  // ==========================================================================
  PORT: z.coerce.number().default(8083).describe("HTTP server port"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  APP_NAME: z.string().default("AlarmStation").describe("Application name"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // MQTT Configuration
  // ==========================================================================
  MQTT_SERVER: z
    .string()
    .min(1, "MQTT_SERVER is required")
    .default("localhost")
    .describe("MQTT broker host"),
  MQTT_PORT: z.coerce
    .number()
    .int()
    .positive()
    .default(8883)
    .describe("MQTT broker port"),
  MQTT_USE_SECURE_CLIENT: envBoolean(true).describe("Connect over TLS"),
  MQTT_CA_PATH: z
    .string()
    .default("certs/broker-ca.crt")
    .describe("CA bundle used to verify the broker certificate"),
  MQTT_CLIENT_ID: z.string().default("hmi-cli").describe("MQTT client id"),
  MQTT_USERNAME: z.string().default("").describe("MQTT username"),
  MQTT_PASSWORD: z.string().default("").describe("MQTT password"),
  MQTT_RPC_TOPIC: z
    .string()
    .default("v1/devices/me/rpc/request/+")
    .describe("Topic carrying alarm RPC requests"),
  MQTT_KEEPALIVE_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(60)
    .describe("MQTT keepalive interval"),
  MQTT_RETRY_BASE_MS: z.coerce
    .number()
    .positive()
    .default(5000)
    .describe("First reconnect delay (ms)"),
  MQTT_RETRY_MAX_MS: z.coerce
    .number()
    .positive()
    .default(60000)
    .describe("Reconnect delay ceiling (ms)"),

  // ==========================================================================
  // Mute & Buzzer
  // ==========================================================================
  MUTE_DURATION: z.coerce
    .number()
    .int()
    .default(600)
    .transform((seconds) => Math.max(seconds, 1))
    .describe("Mute window length in seconds (minimum 1)"),
  BUZZER_ENABLED: envBoolean(true).describe("Enable/disable buzzer control"),
  BUZZER_LINE_NAME: z
    .string()
    .default("BUZZER_EN")
    .describe("GPIO line name resolved with gpiofind"),

  // ==========================================================================
  // Supabase Realtime
  // ==========================================================================
  SUPABASE_URL: optionalString.describe("Supabase project URL"),
  SUPABASE_ANON_KEY: optionalString.describe("Supabase anon API key"),
  SUPABASE_SCHEMA: z
    .string()
    .default("public")
    .describe("Schema watched for UPDATE events"),
  SUPABASE_CHANNEL: z
    .string()
    .default("schema-db-changes")
    .describe("Realtime channel name"),
  SUPABASE_RETRY_BASE_MS: z.coerce
    .number()
    .positive()
    .default(5000)
    .describe("First reconnect delay (ms)"),
  SUPABASE_RETRY_MAX_MS: z.coerce
    .number()
    .positive()
    .default(60000)
    .describe("Reconnect delay ceiling (ms)"),
  DEVICE_STATUS_UTC_OFFSET: z
    .string()
    .regex(/^[+-]\d{2}:\d{2}$/, "Expected an offset like -06:00")
    .default("-06:00")
    .describe("Fixed UTC offset used to render device status timestamps"),

  // ==========================================================================
  // Connectivity Probe
  // ==========================================================================
  CONNECTIVITY_PROBE_HOST: z
    .string()
    .default("8.8.8.8")
    .describe("Host used for the internet reachability probe"),
  CONNECTIVITY_PROBE_PORT: z.coerce
    .number()
    .int()
    .positive()
    .default(53)
    .describe("Port used for the internet reachability probe"),
});

// Parse at startup - crashes immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;

// =============================================================================
// Derived Configuration Objects
// =============================================================================

/**
 * MQTT connection and reconnection settings.
 */
export function getMqttConfig(): MqttConfig {
  return {
    host: config.MQTT_SERVER,
    port: config.MQTT_PORT,
    useTls: config.MQTT_USE_SECURE_CLIENT,
    caPath: config.MQTT_CA_PATH,
    clientId: config.MQTT_CLIENT_ID,
    username: config.MQTT_USERNAME,
    password: config.MQTT_PASSWORD,
    topic: config.MQTT_RPC_TOPIC,
    keepaliveSeconds: config.MQTT_KEEPALIVE_SECONDS,
    retry: {
      baseDelayMs: config.MQTT_RETRY_BASE_MS,
      maxDelayMs: config.MQTT_RETRY_MAX_MS,
    },
  };
}

/**
 * Supabase realtime configuration.
 * Returns null if either the URL or the API key is missing.
 */
export function getRealtimeConfig(): RealtimeConfig | null {
  if (!config.SUPABASE_URL || !config.SUPABASE_ANON_KEY) {
    return null;
  }

  return {
    url: config.SUPABASE_URL,
    apiKey: config.SUPABASE_ANON_KEY,
    schema: config.SUPABASE_SCHEMA,
    channel: config.SUPABASE_CHANNEL,
    pollTimeoutMs: 2000,
    retry: {
      baseDelayMs: config.SUPABASE_RETRY_BASE_MS,
      maxDelayMs: config.SUPABASE_RETRY_MAX_MS,
    },
  };
}

/**
 * Buzzer configuration for the GPIO driver.
 */
export function getBuzzerConfig(): BuzzerConfig {
  return {
    enabled: config.BUZZER_ENABLED,
    lineName: config.BUZZER_LINE_NAME,
    blinkIntervalMs: 1000,
    failureLimit: 5,
  };
}

/**
 * Mute window configuration.
 */
export function getMuteConfig(): MuteConfig {
  return { durationMs: config.MUTE_DURATION * 1000 };
}

/**
 * Refrigerator status vector configuration.
 */
export function getRefrigeratorConfig(): RefrigeratorConfig {
  return { utcOffset: config.DEVICE_STATUS_UTC_OFFSET };
}

/**
 * Internet reachability probe target.
 */
export function getConnectivityConfig(): ConnectivityConfig {
  return {
    host: config.CONNECTIVITY_PROBE_HOST,
    port: config.CONNECTIVITY_PROBE_PORT,
    timeoutMs: 2000,
  };
}

/**
 * Everything the monitoring station needs, in one object.
 */
export function getStationSettings(): StationSettings {
  return {
    mqtt: getMqttConfig(),
    realtime: getRealtimeConfig(),
    buzzer: getBuzzerConfig(),
    mute: getMuteConfig(),
    refrigerator: getRefrigeratorConfig(),
    connectivity: getConnectivityConfig(),
  };
}
