/**
 * Realtime Module - Receive Queue
 *
 * Buffers pushed changes so the listener can pull them one at a time
 * with a timeout. Once closed, buffered changes drain first, then every
 * read reports the close reason.
 */
import type { RealtimeError } from "./errors.js";
import type { ReceiveResult } from "./schema.js";

export type ReceiveQueue = Readonly<{
  push: (payload: unknown) => void;
  close: (error: RealtimeError) => void;
  next: (timeoutMs: number) => Promise<ReceiveResult>;
  isClosed: () => boolean;
}>;

type Waiter = (result: ReceiveResult) => void;

export function createReceiveQueue(): ReceiveQueue {
  const buffered: unknown[] = [];
  let closedWith: RealtimeError | null = null;
  let waiter: Waiter | null = null;

  const settle = (result: ReceiveResult): boolean => {
    if (!waiter) {
      return false;
    }
    const wake = waiter;
    waiter = null;
    wake(result);
    return true;
  };

  const push = (payload: unknown): void => {
    if (closedWith) {
      return;
    }
    if (!settle({ kind: "change", payload })) {
      buffered.push(payload);
    }
  };

  const close = (error: RealtimeError): void => {
    if (closedWith) {
      return;
    }
    closedWith = error;
    settle({ kind: "closed", error });
  };

  const next = (timeoutMs: number): Promise<ReceiveResult> => {
    if (buffered.length > 0) {
      return Promise.resolve({ kind: "change", payload: buffered.shift() });
    }
    if (closedWith) {
      return Promise.resolve({ kind: "closed", error: closedWith });
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        waiter = null;
        resolve({ kind: "timeout" });
      }, timeoutMs);
      waiter = (result) => {
        clearTimeout(timer);
        resolve(result);
      };
    });
  };

  return {
    push,
    close,
    next,
    isClosed: () => closedWith !== null,
  };
}
