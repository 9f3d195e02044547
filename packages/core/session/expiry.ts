import { SESSION_EXPIRY_MS, type SessionRecord } from "./types";

/**
 * A record is valid while it has seen activity within the expiry window.
 */
export function isSessionValid(
  record: SessionRecord,
  now: number = Date.now(),
  expiryMs: number = SESSION_EXPIRY_MS
): boolean {
  return now - record.lastActivity < expiryMs;
}

export function pruneSessions(
  records: SessionRecord[],
  now: number = Date.now(),
  expiryMs: number = SESSION_EXPIRY_MS
): SessionRecord[] {
  return records.filter((record) => isSessionValid(record, now, expiryMs));
}

/** lastActivity never moves backwards. */
export function touch(record: SessionRecord, now: number): SessionRecord {
  return { ...record, lastActivity: Math.max(record.lastActivity, now) };
}
