/**
 * Durable map from hub identity to session record.
 *
 * Reads come from the copy loaded at startup (and refreshed by every mutation);
 * mutations re-read the backend, change only their own key and write the whole
 * document back.
 */
import * as logger from "../logger";
import { StorageError, errorMessage } from "../errors";
import type { SessionBackend } from "./backend";
import { isSessionValid, touch } from "./expiry";
import {
  SESSION_EXPIRY_MS,
  fromPersisted,
  toPersisted,
  type SessionFileData,
  type SessionRecord,
} from "./types";

const log = logger.createLogger("session-store");

export interface SessionStore {
  load(): Promise<void>;
  get(hubIdentity: string): SessionRecord | undefined;
  list(): SessionRecord[];
  upsert(record: SessionRecord): Promise<void>;
  refresh(hubIdentity: string): Promise<SessionRecord | undefined>;
  remove(hubIdentity: string): Promise<boolean>;
  removeAll(): Promise<number>;
  pruneExpired(): Promise<number>;
}

export function createSessionStore(options: {
  backend: SessionBackend;
  now?: () => number;
  expiryMs?: number;
}): SessionStore {
  const { backend } = options;
  const clock = options.now ?? Date.now;
  const expiryMs = options.expiryMs ?? SESSION_EXPIRY_MS;
  let records = new Map<string, SessionRecord>();

  const valid = (record: SessionRecord) => isSessionValid(record, clock(), expiryMs);

  function adopt(data: SessionFileData): void {
    const next = new Map<string, SessionRecord>();
    for (const [hubIdentity, value] of Object.entries(data)) {
      const record = fromPersisted(hubIdentity, value);
      if (!record) {
        log.warn("Skipping malformed session entry", { hubIdentity });
        continue;
      }
      next.set(hubIdentity, record);
    }
    records = next;
  }

  async function load(): Promise<void> {
    adopt(await backend.read());
    log.debug("Sessions loaded", { count: records.size });
    try {
      await pruneExpired();
    } catch (err) {
      log.warn("Pruning at load failed", { error: errorMessage(err) });
    }
  }

  function get(hubIdentity: string): SessionRecord | undefined {
    const record = records.get(hubIdentity);
    if (!record || !valid(record)) return undefined;
    return { ...record };
  }

  function list(): SessionRecord[] {
    return Array.from(records.values())
      .filter(valid)
      .sort((a, b) => b.lastActivity - a.lastActivity)
      .map((record) => ({ ...record }));
  }

  async function upsert(record: SessionRecord): Promise<void> {
    const key = record.hubIdentity;
    adopt(
      await mutate((current) => {
        const existing = fromPersisted(key, current[key]);
        const merged =
          existing && existing.sessionId === record.sessionId
            ? { ...record, lastActivity: Math.max(existing.lastActivity, record.lastActivity) }
            : record;
        return { ...current, [key]: toPersisted(merged) };
      })
    );
    log.debug("Session saved", { hubIdentity: key, sessionId: record.sessionId });
  }

  async function refresh(hubIdentity: string): Promise<SessionRecord | undefined> {
    if (!get(hubIdentity)) return undefined;
    const result: { refreshed?: SessionRecord } = {};
    adopt(
      await mutate((current) => {
        const onDisk = fromPersisted(hubIdentity, current[hubIdentity]);
        // removed or expired elsewhere: never resurrect
        if (!onDisk || !valid(onDisk)) return undefined;
        const refreshed = touch(onDisk, clock());
        result.refreshed = refreshed;
        return { ...current, [hubIdentity]: toPersisted(refreshed) };
      })
    );
    return result.refreshed ? { ...result.refreshed } : undefined;
  }

  async function remove(hubIdentity: string): Promise<boolean> {
    let removed = false;
    adopt(
      await mutate((current) => {
        if (!(hubIdentity in current)) return undefined;
        removed = true;
        const { [hubIdentity]: _dropped, ...rest } = current;
        return rest;
      })
    );
    if (removed) log.info("Session removed", { hubIdentity });
    return removed;
  }

  async function removeAll(): Promise<number> {
    let count = 0;
    adopt(
      await mutate((current) => {
        count = Object.keys(current).length;
        return count === 0 ? undefined : {};
      })
    );
    return count;
  }

  async function pruneExpired(): Promise<number> {
    let pruned = 0;
    adopt(
      await mutate((current) => {
        const kept: SessionFileData = {};
        for (const [hubIdentity, value] of Object.entries(current)) {
          const record = fromPersisted(hubIdentity, value);
          if (record && valid(record)) {
            kept[hubIdentity] = value;
          } else {
            pruned += 1;
          }
        }
        return pruned === 0 ? undefined : kept;
      })
    );
    if (pruned > 0) log.info("Pruned expired sessions", { count: pruned });
    return pruned;
  }

  async function mutate(fn: (current: SessionFileData) => SessionFileData | undefined): Promise<SessionFileData> {
    try {
      return await backend.update(fn);
    } catch (err) {
      if (err instanceof StorageError) throw err;
      throw new StorageError("Session store update failed", "storage_failed", err);
    }
  }

  return { load, get, list, upsert, refresh, remove, removeAll, pruneExpired };
}
