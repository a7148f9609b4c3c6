/**
 * MQTT Module - Error Types
 *
 * Every variant is transient: the listener backs off and reconnects.
 */

export type MqttError =
  | {
      readonly type: "TLS_MATERIAL_UNAVAILABLE";
      readonly path: string;
      readonly message: string;
    }
  | {
      readonly type: "CONNECT_FAILED";
      readonly message: string;
    }
  | {
      readonly type: "SUBSCRIBE_FAILED";
      readonly topic: string;
      readonly message: string;
    }
  | {
      readonly type: "STREAM_ENDED";
      readonly message: string;
    };

export function tlsMaterialUnavailable(
  path: string,
  message: string,
): MqttError {
  return { type: "TLS_MATERIAL_UNAVAILABLE", path, message };
}

export function connectFailed(message: string): MqttError {
  return { type: "CONNECT_FAILED", message };
}

export function subscribeFailed(topic: string, message: string): MqttError {
  return { type: "SUBSCRIBE_FAILED", topic, message };
}

export function streamEnded(message: string): MqttError {
  return { type: "STREAM_ENDED", message };
}

/**
 * Format an MqttError for logging.
 */
export function formatMqttError(error: MqttError): string {
  switch (error.type) {
    case "TLS_MATERIAL_UNAVAILABLE":
      return `Cannot read CA bundle ${error.path}: ${error.message}`;
    case "CONNECT_FAILED":
      return `Connect failed: ${error.message}`;
    case "SUBSCRIBE_FAILED":
      return `Subscribe to ${error.topic} failed: ${error.message}`;
    case "STREAM_ENDED":
      return `Stream ended: ${error.message}`;
  }
}
