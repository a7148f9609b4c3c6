/**
 * Alerts Module - Service Layer
 *
 * The alert lifecycle coordinator. Applies alarm activations and clearings
 * to the store, keeps the mute window and the buzzer consistent with it,
 * and notifies the front end.
 */
import { type Result, err, ok } from "neverthrow";

import type { BuzzerDriver } from "../buzzer/index.js";
import { createLogger } from "../logger.js";
import type { MuteConfig, MuteStatus } from "../mute/index.js";
import { createMuteController } from "../mute/index.js";
import type { StationNotifier } from "../notifications/index.js";
import type { AlarmPayloadError } from "./errors.js";
import { formatAlarmPayloadError } from "./errors.js";
import type { AlarmOutcome, Alert } from "./schema.js";
import type { AlertStore } from "./store.js";
import { alertFromAlarm, isAlarmMethod, parseAlarmEnvelope } from "./transform.js";

const log = createLogger("alerts");

export type AlertCoordinator = Readonly<{
  /** Decode and apply one MQTT RPC payload. Never throws. */
  handleRpcPayload: (
    payload: Buffer | string,
  ) => Promise<Result<AlarmOutcome, AlarmPayloadError>>;
  activateAlert: (alert: Alert) => Promise<void>;
  /** Clearing path. Resolves to whether the alert was present. */
  clearAlert: (id: string) => Promise<boolean>;
  /** User-initiated removal; same semantics as clearAlert */
  removeAlert: (id: string) => Promise<boolean>;
  getActiveAlerts: () => Alert[];
  getMuteStatus: () => MuteStatus;
  toggleMute: () => Promise<MuteStatus>;
  dispose: () => void;
}>;

export type AlertCoordinatorOptions = Readonly<{
  store: AlertStore;
  buzzer: Pick<BuzzerDriver, "setState">;
  notifier: StationNotifier;
  muteConfig: MuteConfig;
  now?: () => number;
}>;

export function createAlertCoordinator(
  options: AlertCoordinatorOptions,
): AlertCoordinator {
  const { store, buzzer, notifier } = options;
  const now = options.now ?? Date.now;

  const applyBuzzer = async (on: boolean): Promise<void> => {
    const success = await buzzer.setState(on);
    if (!success) {
      log.error({ on }, "Failed to set buzzer state");
    }
  };

  const mute = createMuteController({
    config: options.muteConfig,
    now,
    onExpire: async () => {
      await applyBuzzer(!store.isEmpty());
      // Re-read: an activation or re-mute may have landed meanwhile
      notifier.muteChanged(mute.getStatus());
    },
  });

  const activateAlert = async (alert: Alert): Promise<void> => {
    store.upsert(alert);
    log.info(
      { id: alert.id, device: alert.device, type: alert.type },
      "Alert activated",
    );

    const unmuted = mute.forceUnmute();
    if (unmuted) {
      notifier.muteChanged(unmuted);
    }

    await applyBuzzer(true);
    notifier.alertAdded(alert);
  };

  const clearAlert = async (id: string): Promise<boolean> => {
    const removed = store.remove(id);
    if (!removed) {
      log.debug({ id }, "Clear for unknown alert ignored");
      return false;
    }

    log.info({ id, remaining: store.size() }, "Alert cleared");
    notifier.alertRemoved(id);

    if (store.isEmpty()) {
      const unmuted = mute.forceUnmute();
      if (unmuted) {
        notifier.muteChanged(unmuted);
      }
      await applyBuzzer(false);
    }

    return true;
  };

  const handleRpcPayload = async (
    payload: Buffer | string,
  ): Promise<Result<AlarmOutcome, AlarmPayloadError>> => {
    const parsed = parseAlarmEnvelope(payload);
    if (parsed.isErr()) {
      log.warn(
        { error: formatAlarmPayloadError(parsed.error) },
        "Dropping malformed alarm payload",
      );
      return err(parsed.error);
    }

    const { method, params } = parsed.value;
    if (!isAlarmMethod(method)) {
      log.debug({ method }, "Ignoring non-alarm RPC");
      return ok({ kind: "ignored", reason: "method" });
    }

    switch (params.status) {
      case "ACTIVE_UNACK": {
        const alert = alertFromAlarm(params, now());
        await activateAlert(alert);
        return ok({ kind: "activated", alert });
      }
      case "CLEARED_UNACK": {
        const removed = await clearAlert(params.id.id);
        return ok({ kind: "cleared", id: params.id.id, removed });
      }
      case "UNKNOWN":
        log.warn({ id: params.id.id }, "Ignoring alarm with unhandled status");
        return ok({ kind: "ignored", reason: "status" });
    }
  };

  /** Emit the status as it stands after the buzzer write, not before it */
  const publishMuteStatus = (): MuteStatus => {
    const status = mute.getStatus();
    notifier.muteChanged(status);
    return status;
  };

  const toggleMute = async (): Promise<MuteStatus> => {
    if (mute.isMuted()) {
      mute.forceUnmute();
      await applyBuzzer(!store.isEmpty());
      return publishMuteStatus();
    }

    if (store.isEmpty()) {
      log.debug("Mute toggle ignored with no active alerts");
      return mute.getStatus();
    }

    mute.mute();
    await applyBuzzer(false);
    return publishMuteStatus();
  };

  return {
    handleRpcPayload,
    activateAlert,
    clearAlert,
    removeAlert: (id) => {
      log.info({ id }, "Alert removal requested");
      return clearAlert(id);
    },
    getActiveAlerts: () => store.snapshot(),
    getMuteStatus: () => mute.getStatus(),
    toggleMute,
    dispose: () => mute.dispose(),
  };
}
