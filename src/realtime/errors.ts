/**
 * Realtime Module - Error Types
 */

export type RealtimeError =
  | {
      readonly type: "CONNECT_FAILED";
      readonly message: string;
    }
  | {
      readonly type: "SUBSCRIBE_FAILED";
      readonly status: string;
      readonly message: string;
    }
  | {
      readonly type: "CHANNEL_CLOSED";
      readonly message: string;
    };

export function connectFailed(message: string): RealtimeError {
  return { type: "CONNECT_FAILED", message };
}

export function subscribeFailed(status: string, message: string): RealtimeError {
  return { type: "SUBSCRIBE_FAILED", status, message };
}

export function channelClosed(message: string): RealtimeError {
  return { type: "CHANNEL_CLOSED", message };
}

/**
 * Format a RealtimeError for logging.
 */
export function formatRealtimeError(error: RealtimeError): string {
  switch (error.type) {
    case "CONNECT_FAILED":
      return `Connect failed: ${error.message}`;
    case "SUBSCRIBE_FAILED":
      return `Subscribe failed (${error.status}): ${error.message}`;
    case "CHANNEL_CLOSED":
      return `Channel closed: ${error.message}`;
  }
}
