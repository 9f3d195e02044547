import * as log from "../logger";
import type { HubConnection } from "./connection";
import {
  decodeHubMessage,
  isAuthMessage,
  type HubMessage,
  type OtherMessage,
} from "../protocols/hubAuth";

export type AuthHubMessage = Exclude<HubMessage, OtherMessage>;

export type InboxResult =
  | { type: "message"; message: AuthHubMessage }
  | { type: "timeout" }
  | { type: "closed"; reason: string }
  | { type: "aborted" };

export interface WaitOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Inbound auth messages of one connection, consumed in order.
 *
 * Every wait is bounded by a timeout and ends early on abort or close, so no
 * suspension point of the auth flow can hang.
 */
export interface MessageInbox {
  next(options: WaitOptions): Promise<InboxResult>;
  dispose(): void;
}

export function createMessageInbox(connection: HubConnection): MessageInbox {
  const queue: AuthHubMessage[] = [];
  let closedReason: string | null = null;
  let waiter: ((result: InboxResult) => void) | null = null;

  const offMessage = connection.onMessage((text) => {
    const msg = decodeHubMessage(text);
    if (!msg) {
      log.debug("Dropping undecodable frame", { endpoint: connection.endpoint, bytes: text.length });
      return;
    }
    if (!isAuthMessage(msg)) {
      log.debug("Ignoring non-auth message during auth", { endpoint: connection.endpoint, status: msg.status });
      return;
    }
    if (waiter) {
      waiter({ type: "message", message: msg });
      return;
    }
    queue.push(msg);
  });

  const offClose = connection.onClose(({ reason }) => {
    closedReason = reason || "closed";
    waiter?.({ type: "closed", reason: closedReason });
  });

  function next(options: WaitOptions): Promise<InboxResult> {
    const { signal } = options;
    if (signal?.aborted) return Promise.resolve({ type: "aborted" });
    const queued = queue.shift();
    if (queued) return Promise.resolve({ type: "message", message: queued });
    if (closedReason !== null) return Promise.resolve({ type: "closed", reason: closedReason });
    if (waiter) return Promise.reject(new Error("inbox_busy"));

    return new Promise<InboxResult>((resolve) => {
      const finish = (result: InboxResult) => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        waiter = null;
        resolve(result);
      };
      const onAbort = () => finish({ type: "aborted" });
      const timer = setTimeout(() => finish({ type: "timeout" }), options.timeoutMs);
      signal?.addEventListener("abort", onAbort, { once: true });
      waiter = finish;
    });
  }

  return {
    next,
    dispose() {
      offMessage();
      offClose();
      queue.length = 0;
      waiter?.({ type: "aborted" });
    },
  };
}
