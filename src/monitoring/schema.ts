/**
 * Monitoring Module - Schemas and Types
 *
 * Settings and seams for the station that wires every service together.
 */
import type { BuzzerConfig, GpioRunner } from "../buzzer/index.js";
import type { ConnectivityConfig } from "../connectivity/index.js";
import type { BrokerConnector, MqttConfig } from "../mqtt/index.js";
import type { MuteConfig } from "../mute/index.js";
import type { StationNotifier } from "../notifications/index.js";
import type { RealtimeConfig, RealtimeConnector } from "../realtime/index.js";
import type { RefrigeratorConfig } from "../refrigerator/index.js";
import type { ShutdownSignal } from "../shutdown/index.js";

// =============================================================================
// Station Settings
// =============================================================================

export type StationSettings = Readonly<{
  mqtt: MqttConfig;
  /** null disables the realtime listener */
  realtime: RealtimeConfig | null;
  buzzer: BuzzerConfig;
  mute: MuteConfig;
  refrigerator: RefrigeratorConfig;
  connectivity: ConnectivityConfig;
}>;

/**
 * Replaceable collaborators. Defaults talk to real hardware and brokers.
 */
export type StationOverrides = Readonly<{
  gpio?: GpioRunner;
  mqttConnector?: BrokerConnector;
  realtimeConnector?: RealtimeConnector;
  notifier?: StationNotifier;
  shutdown?: ShutdownSignal;
  now?: () => number;
}>;

// =============================================================================
// Station State
// =============================================================================

export type StationPhase = "idle" | "running" | "stopping" | "stopped";
