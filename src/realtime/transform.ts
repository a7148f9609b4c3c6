/**
 * Realtime Module - Pure Transformations
 */
import { type Result, err, ok } from "neverthrow";

import type { ChangePayload } from "./schema.js";
import { ChangePayloadSchema } from "./schema.js";

/**
 * Decode a raw change into the fields the refrigerator monitor needs.
 * Returns a readable reason when the change has the wrong shape.
 */
export function decodeChange(payload: unknown): Result<ChangePayload, string> {
  const parsed = ChangePayloadSchema.safeParse(payload);
  if (!parsed.success) {
    return err(
      parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; "),
    );
  }
  return ok(parsed.data);
}
