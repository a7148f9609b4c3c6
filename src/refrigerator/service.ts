/**
 * Refrigerator Module - Service Layer
 *
 * Keeps the last known status vector and turns bit flips into alerts
 * routed through the alert coordinator.
 */
import { type Result, err, ok } from "neverthrow";

import type { AlertCoordinator } from "../alerts/index.js";
import { createLogger } from "../logger.js";
import type { StationNotifier } from "../notifications/index.js";
import type { RefrigeratorError } from "./errors.js";
import { formatRefrigeratorError } from "./errors.js";
import type {
  DeviceStatusUpdate,
  RefrigeratorConfig,
  StatusVector,
} from "./schema.js";
import { INITIAL_STATUS_VECTOR, REFRIGERATOR_NAMES } from "./schema.js";
import {
  diffStatusVectors,
  formatCommitTimestamp,
  parseStatusVector,
  refrigeratorAlert,
  refrigeratorAlertId,
} from "./transform.js";

const log = createLogger("refrigerator");

export type RefrigeratorMonitor = Readonly<{
  handleStatusVector: (
    message: string,
    commitTimestamp: string,
  ) => Promise<Result<DeviceStatusUpdate, RefrigeratorError>>;
  getState: () => StatusVector;
}>;

export type RefrigeratorMonitorOptions = Readonly<{
  config: RefrigeratorConfig;
  alerts: Pick<AlertCoordinator, "activateAlert" | "clearAlert">;
  notifier: StationNotifier;
  now?: () => number;
}>;

export function createRefrigeratorMonitor(
  options: RefrigeratorMonitorOptions,
): RefrigeratorMonitor {
  const now = options.now ?? Date.now;
  let state: StatusVector = INITIAL_STATUS_VECTOR;

  const handleStatusVector = async (
    message: string,
    commitTimestamp: string,
  ): Promise<Result<DeviceStatusUpdate, RefrigeratorError>> => {
    const parsed = parseStatusVector(message);
    if (parsed.isErr()) {
      log.error(
        { message, error: formatRefrigeratorError(parsed.error) },
        "Status vector rejected",
      );
      return err(parsed.error);
    }

    const status = parsed.value;
    const timestamp = formatCommitTimestamp(
      commitTimestamp,
      options.config.utcOffset,
      now(),
    );

    // Swap before any await so interleaved vectors diff against each other
    const previous = state;
    state = status;

    log.info({ status, timestamp }, "Refrigerator status updated");

    for (const transition of diffStatusVectors(previous, status)) {
      const device = REFRIGERATOR_NAMES[transition.index];
      if (transition.direction === "raised") {
        log.info({ index: transition.index, device }, "Refrigerator out of range");
        await options.alerts.activateAlert(refrigeratorAlert(transition.index, now()));
      } else {
        log.info({ index: transition.index, device }, "Refrigerator back in range");
        await options.alerts.clearAlert(refrigeratorAlertId(transition.index));
      }
    }

    const update: DeviceStatusUpdate = { timestamp, status: [...status] };
    options.notifier.deviceStatusChanged(update);
    return ok(update);
  };

  return {
    handleStatusVector,
    getState: () => [...state],
  };
}
