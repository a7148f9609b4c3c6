/**
 * Realtime Module - Schemas and Types
 *
 * Database change feed carrying the refrigerator status vector.
 */
import type { Result } from "neverthrow";
import { z } from "zod";

import type { RetryPolicy } from "../backoff.js";
import type { RealtimeError } from "./errors.js";

// =============================================================================
// Configuration
// =============================================================================

export type RealtimeConfig = Readonly<{
  url: string;
  apiKey: string;
  /** Schema watched for UPDATE events */
  schema: string;
  channel: string;
  /** Receive timeout; a timeout is not a failure */
  pollTimeoutMs: number;
  retry: RetryPolicy;
}>;

// =============================================================================
// Change Payload
// =============================================================================

/**
 * UPDATE change as delivered by the realtime server.
 * `new.message` holds the JSON-encoded status vector.
 */
export const ChangePayloadSchema = z.object({
  commit_timestamp: z.string(),
  new: z.object({
    message: z.string(),
  }),
});

export type ChangePayload = z.infer<typeof ChangePayloadSchema>;

// =============================================================================
// Connection Seam
// =============================================================================

export type ReceiveResult =
  | Readonly<{ kind: "change"; payload: unknown }>
  | Readonly<{ kind: "timeout" }>
  | Readonly<{ kind: "closed"; error: RealtimeError }>;

export type RealtimeConnection = Readonly<{
  /** Join the change channel; resolves once the server confirms */
  subscribe: () => Promise<Result<void, RealtimeError>>;
  /** Next change, or timeout/closed */
  next: (timeoutMs: number) => Promise<ReceiveResult>;
  close: () => Promise<void>;
}>;

export type RealtimeConnector = Readonly<{
  connect: (
    config: RealtimeConfig,
  ) => Promise<Result<RealtimeConnection, RealtimeError>>;
}>;
