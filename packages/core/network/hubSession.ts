import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { HubConnection } from "../messaging/connection";
import type { SessionStore } from "../session/store";
import type { SessionRecord } from "../session/types";
import { ACTIVITY_REFRESH_INTERVAL_MS } from "./constants";
import type { Candidate } from "./types";

const log = createLogger("hub-session");

/**
 * An authenticated connection to a hub.
 *
 * Inbound messages keep the stored session alive; the store is written at most
 * once per refresh interval.
 */
export interface HubSession {
  readonly hubIdentity: string;
  readonly candidate: Candidate;
  readonly connection: HubConnection;
  record(): SessionRecord;
  sendJson(payload: unknown): Promise<void>;
  /** JSON messages from the hub; frames that are not JSON are dropped. */
  onMessage(cb: (message: unknown) => void): () => void;
  onClose(cb: (reason: string) => void): () => void;
  close(reason?: string): Promise<void>;
}

export function createHubSession(options: {
  connection: HubConnection;
  candidate: Candidate;
  record: SessionRecord;
  store: SessionStore;
  now?: () => number;
  refreshIntervalMs?: number;
}): HubSession {
  const { connection, candidate, store } = options;
  const clock = options.now ?? Date.now;
  const interval = options.refreshIntervalMs ?? ACTIVITY_REFRESH_INTERVAL_MS;
  const hubIdentity = options.record.hubIdentity;
  const handlers = new Set<(message: unknown) => void>();
  const pending: unknown[] = [];
  let current = options.record;
  let lastRefresh = clock();
  let refreshing = false;

  async function refreshActivity() {
    refreshing = true;
    try {
      const refreshed = await store.refresh(hubIdentity);
      if (refreshed) current = refreshed;
    } catch (err) {
      log.warn("Activity refresh failed", { hubIdentity, error: errorMessage(err) });
    } finally {
      refreshing = false;
    }
  }

  const offMessage = connection.onMessage((text) => {
    const now = clock();
    if (!refreshing && now - lastRefresh >= interval) {
      lastRefresh = now;
      void refreshActivity();
    }

    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch {
      log.debug("Dropping non-JSON frame", { hubIdentity, bytes: text.length });
      return;
    }
    if (handlers.size === 0) {
      pending.push(message);
      return;
    }
    for (const h of [...handlers]) h(message);
  });

  connection.onClose(({ reason }) => {
    offMessage();
    log.info("Hub connection closed", { hubIdentity, reason });
  });

  return {
    hubIdentity,
    candidate,
    connection,
    record: () => ({ ...current }),
    sendJson: (payload) => connection.send(JSON.stringify(payload)),
    onMessage(cb) {
      handlers.add(cb);
      for (const message of pending.splice(0)) cb(message);
      return () => {
        handlers.delete(cb);
      };
    },
    onClose(cb) {
      return connection.onClose(({ reason }) => cb(reason));
    },
    close: (reason) => connection.close(reason),
  };
}
