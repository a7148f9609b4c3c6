/**
 * SSE Module - Service Layer
 *
 * Fans station notifications out to every open front-end event stream.
 */
import type { Alert } from "../alerts/index.js";
import { createLogger } from "../logger.js";
import type { MuteStatus } from "../mute/index.js";
import type { DeviceStatusUpdate } from "../refrigerator/index.js";
import type { SseEvent } from "./schema.js";

const log = createLogger("sse");

const encoder = new TextEncoder();

type StreamController = ReadableStreamDefaultController<Uint8Array>;

const streams = new Map<number, StreamController>();
let nextClientId = 1;

const encodeFrame = (event: string, data: unknown): Uint8Array =>
  encoder.encode(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);

export function getClientCount(): number {
  return streams.size;
}

/**
 * Open an event stream for one front end.
 * The `connected` frame goes first, then `initial` in order, so a late
 * joiner sees the current state before any live update.
 */
export function openEventStream(initial: readonly SseEvent[] = []): {
  stream: ReadableStream<Uint8Array>;
  clientId: number;
} {
  const clientId = nextClientId++;

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      streams.set(clientId, controller);
      controller.enqueue(encodeFrame("connected", { clientId }));
      for (const event of initial) {
        controller.enqueue(encodeFrame(event.type, event));
      }
      log.info({ clientId, clients: streams.size }, "Event stream opened");
    },
    cancel() {
      streams.delete(clientId);
      log.info({ clientId, clients: streams.size }, "Event stream closed by client");
    },
  });

  return { stream, clientId };
}

function broadcast(event: SseEvent): void {
  if (streams.size === 0) {
    log.debug({ eventType: event.type }, "No open event streams");
    return;
  }

  const frame = encodeFrame(event.type, event);
  for (const [clientId, controller] of streams) {
    try {
      controller.enqueue(frame);
    } catch (error) {
      // Enqueue throws once the stream is closed or errored
      streams.delete(clientId);
      log.debug({ clientId, error }, "Dropped dead event stream");
    }
  }

  log.debug({ eventType: event.type, clients: streams.size }, "Event sent");
}

export function broadcastAlertAdded(alert: Alert): void {
  broadcast({ type: "alert_added", alert });
}

export function broadcastAlertRemoved(id: string): void {
  broadcast({ type: "alert_removed", id });
}

export function broadcastMuteChanged(status: MuteStatus): void {
  broadcast({ type: "mute_changed", ...status });
}

export function broadcastDeviceStatus(update: DeviceStatusUpdate): void {
  broadcast({ type: "device_status_changed", ...update });
}

/**
 * Close every open stream. Called once the station has stopped.
 */
export function disconnectAllClients(): void {
  log.info({ clients: streams.size }, "Closing event streams");

  for (const [clientId, controller] of streams) {
    try {
      controller.close();
    } catch (error) {
      log.debug({ clientId, error }, "Event stream already closed");
    }
  }

  streams.clear();
}
