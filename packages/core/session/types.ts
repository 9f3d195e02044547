/**
 * Session records, keyed by the identity the hub reports in its challenge.
 */

export const SESSION_EXPIRY_MS = 7 * 24 * 60 * 60 * 1000;

export interface SessionRecord {
  sessionId: string;
  token: string; // bearer credential, never logged
  hubIdentity: string;
  clientHostname: string;
  lastActivity: number; // epoch ms
}

/** On-disk shape of one entry; the hub identity is the object key. */
export interface PersistedSession {
  session_id: string;
  token: string;
  hostname: string;
  last_activity: number;
}

export type SessionFileData = Record<string, unknown>;

export function toPersisted(record: SessionRecord): PersistedSession {
  return {
    session_id: record.sessionId,
    token: record.token,
    hostname: record.clientHostname,
    last_activity: record.lastActivity,
  };
}

export function fromPersisted(hubIdentity: string, value: unknown): SessionRecord | null {
  if (!hubIdentity || !isRecord(value)) return null;
  const entry = value;
  if (typeof entry.session_id !== "string" || entry.session_id.length === 0) return null;
  if (typeof entry.token !== "string" || entry.token.length === 0) return null;
  if (typeof entry.last_activity !== "number" || !Number.isFinite(entry.last_activity)) return null;
  return {
    sessionId: entry.session_id,
    token: entry.token,
    hubIdentity,
    clientHostname: typeof entry.hostname === "string" ? entry.hostname : "",
    lastActivity: entry.last_activity,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}
