/**
 * Buzzer Module - Service Layer
 *
 * Drives the buzzer line and runs the blink loop while alerting.
 * Hardware commands run one at a time through a promise chain; the
 * latest setState request wins over any queued earlier request.
 */
import { createLogger } from "../logger.js";
import { formatBuzzerError } from "./errors.js";
import type { BuzzerConfig, GpioLevel, GpioLine, GpioRunner } from "./schema.js";
import { flipLevel } from "./transform.js";

const log = createLogger("buzzer");

export type BuzzerDriver = Readonly<{
  /** Turn alerting on (blink) or off (line low). Resolves to success. */
  setState: (on: boolean) => Promise<boolean>;
  isBlinking: () => boolean;
  /** Last resolved line, null until resolved or after a failure */
  getCachedLine: () => GpioLine | null;
  /** Stop blinking, leave the line low and ignore every later request */
  shutdown: () => Promise<boolean>;
}>;

export type BuzzerDriverOptions = Readonly<{
  config: BuzzerConfig;
  gpio: GpioRunner;
}>;

type BlinkLoop = {
  level: GpioLevel;
  failures: number;
  timer: ReturnType<typeof setTimeout> | null;
};

export function createBuzzerDriver(options: BuzzerDriverOptions): BuzzerDriver {
  const { config, gpio } = options;

  let cachedLine: GpioLine | null = null;
  let blink: BlinkLoop | null = null;
  let latestRequest = 0;
  let stopped = false;
  let queue: Promise<unknown> = Promise.resolve();

  const serialize = <T>(task: () => Promise<T>): Promise<T> => {
    const next = queue.then(task);
    queue = next.catch(() => undefined);
    return next;
  };

  const invalidateLine = (): void => {
    cachedLine = null;
  };

  const resolveLine = async (): Promise<GpioLine | null> => {
    if (cachedLine) {
      return cachedLine;
    }

    const found = await gpio.find(config.lineName);
    if (found.isErr()) {
      log.error(
        { lineName: config.lineName, error: formatBuzzerError(found.error) },
        "Could not resolve buzzer line",
      );
      return null;
    }

    cachedLine = found.value;
    log.debug({ ...found.value }, "Buzzer line resolved");
    return cachedLine;
  };

  const writeLevel = async (level: GpioLevel): Promise<boolean> => {
    const line = await resolveLine();
    if (!line) {
      return false;
    }

    const result = await gpio.set(line, level);
    if (result.isErr()) {
      log.error(
        { level, error: formatBuzzerError(result.error) },
        "Could not drive buzzer line",
      );
      invalidateLine();
      return false;
    }
    return true;
  };

  const stopBlink = (): void => {
    if (blink?.timer) {
      clearTimeout(blink.timer);
    }
    blink = null;
  };

  const scheduleTick = (loop: BlinkLoop): void => {
    loop.timer = setTimeout(() => {
      loop.timer = null;
      serialize(() => tick(loop)).catch((error: unknown) => {
        log.error({ error }, "Blink tick failed");
      });
    }, config.blinkIntervalMs);
  };

  const tick = async (loop: BlinkLoop): Promise<void> => {
    if (stopped || blink !== loop) {
      return;
    }

    loop.level = flipLevel(loop.level);
    if (await writeLevel(loop.level)) {
      loop.failures = 0;
    } else {
      loop.failures++;
      log.warn(
        { level: loop.level, failures: loop.failures },
        "Failed to toggle buzzer level",
      );
      if (loop.failures >= config.failureLimit) {
        log.fatal(
          { failureLimit: config.failureLimit },
          "Buzzer blink loop stopped after consecutive failures",
        );
        blink = null;
        await writeLevel(0);
        return;
      }
    }

    if (blink === loop) {
      scheduleTick(loop);
    }
  };

  const turnOn = (request: number): Promise<boolean> =>
    serialize(async () => {
      if (stopped || request !== latestRequest) {
        return true;
      }
      if (blink) {
        return true;
      }

      if (!(await writeLevel(1))) {
        return false;
      }
      if (stopped || request !== latestRequest) {
        return true;
      }

      const loop: BlinkLoop = { level: 1, failures: 0, timer: null };
      blink = loop;
      scheduleTick(loop);
      log.info("Buzzer activated");
      return true;
    });

  const turnOff = (): Promise<boolean> => {
    stopBlink();
    return serialize(async () => {
      stopBlink();
      const success = await writeLevel(0);
      if (success) {
        log.info("Buzzer deactivated");
      }
      return success;
    });
  };

  const setState = async (on: boolean): Promise<boolean> => {
    if (stopped) {
      log.debug({ on }, "Buzzer state change ignored after shutdown");
      return true;
    }
    const request = ++latestRequest;

    if (!config.enabled) {
      log.debug({ on }, "Buzzer state change ignored (disabled)");
      if (!on) {
        stopBlink();
      }
      return true;
    }

    if (on && blink) {
      return true;
    }

    return on ? turnOn(request) : turnOff();
  };

  const shutdown = async (): Promise<boolean> => {
    stopped = true;
    latestRequest++;
    if (!config.enabled) {
      stopBlink();
      return true;
    }
    return turnOff();
  };

  return {
    setState,
    isBlinking: () => blink !== null,
    getCachedLine: () => cachedLine,
    shutdown,
  };
}
