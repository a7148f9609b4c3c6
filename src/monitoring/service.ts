/**
 * Monitoring Module - Service Layer
 *
 * Composition root for the alarm station: builds the alert store, buzzer,
 * coordinator and refrigerator monitor, runs the MQTT and realtime loops,
 * and exposes the command surface used by the HTTP routes.
 */
import {
  type Alert,
  createAlertCoordinator,
  createAlertStore,
} from "../alerts/index.js";
import { createBuzzerDriver, createGpioCommandRunner } from "../buzzer/index.js";
import {
  type ConnectivityStatus,
  checkInternetConnection,
} from "../connectivity/index.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  createMqttAlarmListener,
  createMqttConnector,
} from "../mqtt/index.js";
import type { MuteStatus } from "../mute/index.js";
import { createSseNotifier } from "../notifications/index.js";
import {
  type RealtimeListener,
  createRealtimeListener,
  createSupabaseConnector,
} from "../realtime/index.js";
import {
  type StatusVector,
  createRefrigeratorMonitor,
} from "../refrigerator/index.js";
import { disconnectAllClients } from "../sse/index.js";
import { createShutdownSignal } from "../shutdown/index.js";
import type {
  StationOverrides,
  StationPhase,
  StationSettings,
} from "./schema.js";

const log = createLogger("monitoring");

export type MonitoringStation = Readonly<{
  /** Launch the MQTT and realtime loops in the background */
  start: () => void;
  /** Request shutdown, silence the buzzer and wait for the loops to exit */
  stop: () => Promise<void>;
  getPhase: () => StationPhase;

  getActiveAlerts: () => Alert[];
  removeAlert: (id: string) => Promise<boolean>;
  getMuteStatus: () => MuteStatus;
  toggleMute: () => Promise<MuteStatus>;
  getConnectivity: () => ConnectivityStatus;
  checkInternetConnection: () => Promise<boolean>;
  getDeviceStatus: () => StatusVector;
  isRealtimeEnabled: () => boolean;
}>;

export function createMonitoringStation(
  settings: StationSettings,
  overrides: StationOverrides = {},
): MonitoringStation {
  const shutdown = overrides.shutdown ?? createShutdownSignal();
  const notifier = overrides.notifier ?? createSseNotifier();
  const now = overrides.now ?? Date.now;

  const store = createAlertStore();
  const buzzer = createBuzzerDriver({
    config: settings.buzzer,
    gpio: overrides.gpio ?? createGpioCommandRunner(),
  });
  const coordinator = createAlertCoordinator({
    store,
    buzzer,
    notifier,
    muteConfig: settings.mute,
    now,
  });
  const refrigerator = createRefrigeratorMonitor({
    config: settings.refrigerator,
    alerts: coordinator,
    notifier,
    now,
  });

  const mqttListener = createMqttAlarmListener({
    config: settings.mqtt,
    connector: overrides.mqttConnector ?? createMqttConnector(),
    onPayload: (payload) => coordinator.handleRpcPayload(payload),
    shutdown,
  });

  const realtimeListener: RealtimeListener | null = settings.realtime
    ? createRealtimeListener({
        config: settings.realtime,
        connector: overrides.realtimeConnector ?? createSupabaseConnector(),
        onStatusVector: (message, commitTimestamp) =>
          refrigerator.handleStatusVector(message, commitTimestamp),
        shutdown,
      })
    : null;

  let phase: StationPhase = "idle";
  let loops: Promise<void>[] = [];

  const launch = (name: string, loop: () => Promise<void>): Promise<void> =>
    loop().catch((error: unknown) => {
      logOperationFailed(log, name, error);
    });

  const start = (): void => {
    if (phase !== "idle") {
      log.warn({ phase }, "Station already started");
      return;
    }

    logOperationStart(log, "startStation", {
      realtime: realtimeListener !== null,
      buzzer: settings.buzzer.enabled,
    });
    phase = "running";

    loops = [launch("mqttListener", mqttListener.run)];
    if (realtimeListener) {
      loops.push(launch("realtimeListener", realtimeListener.run));
    } else {
      log.warn("Supabase URL or API key missing, realtime listener disabled");
    }
  };

  const stop = async (): Promise<void> => {
    if (phase === "stopping" || phase === "stopped") {
      return;
    }

    const startTime = Date.now();
    logOperationStart(log, "stopStation");
    phase = "stopping";

    shutdown.request();
    coordinator.dispose();
    if (!(await buzzer.shutdown())) {
      log.error("Failed to silence buzzer during shutdown");
    }
    disconnectAllClients();
    await Promise.all(loops);

    phase = "stopped";
    logOperationComplete(log, "stopStation", startTime);
  };

  return {
    start,
    stop,
    getPhase: () => phase,
    getActiveAlerts: coordinator.getActiveAlerts,
    removeAlert: coordinator.removeAlert,
    getMuteStatus: coordinator.getMuteStatus,
    toggleMute: coordinator.toggleMute,
    getConnectivity: () => ({
      mqtt: mqttListener.isConnected(),
      realtime: realtimeListener?.isConnected() ?? false,
    }),
    checkInternetConnection: () =>
      checkInternetConnection(settings.connectivity),
    getDeviceStatus: refrigerator.getState,
    isRealtimeEnabled: () => realtimeListener !== null,
  };
}
