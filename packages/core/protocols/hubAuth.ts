/**
 * Hub authentication protocol (challenge, session auth, pairing), JSON text frames.
 */

export type ChallengeMessage = { kind: "challenge"; hubIdentity: string | null };
export type AuthenticatedMessage = { kind: "authenticated" };
export type GrantedMessage = {
  kind: "granted";
  sessionId: string | null;
  token: string | null;
  pairingCode: string | null;
};
export type DeniedMessage = { kind: "denied"; reason: string; pairingCode: string | null };
export type ErrorMessage = { kind: "error"; reason: string };
/** Anything that is not part of the auth exchange; ignored until auth completes. */
export type OtherMessage = { kind: "other"; status: string | null };

export type HubMessage =
  | ChallengeMessage
  | AuthenticatedMessage
  | GrantedMessage
  | DeniedMessage
  | ErrorMessage
  | OtherMessage;

export type SessionAuthMessage = { status: "auth"; session_id: string };
export type PairingRequestMessage = { status: "auth"; pairing_code: string; hostname: string };
export type ClientAuthMessage = SessionAuthMessage | PairingRequestMessage;

const STALE_REASONS = new Set(["unknown", "unknown_session", "session_not_found", "not_found"]);

export function sessionAuthMessage(sessionId: string): SessionAuthMessage {
  return { status: "auth", session_id: sessionId };
}

export function pairingRequestMessage(pairingCode: string, hostname: string): PairingRequestMessage {
  return { status: "auth", pairing_code: pairingCode, hostname };
}

export function encodeClientMessage(msg: ClientAuthMessage): string {
  return JSON.stringify(msg);
}

export function decodeHubMessage(raw: string): HubMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  const field = fieldReader(parsed);
  const status = field("status");

  switch (status) {
    case "auth_required":
      return { kind: "challenge", hubIdentity: nonEmpty(field("hub_identity")) };
    case "authenticated": {
      const sessionId = nonEmpty(field("session_id"));
      const token = nonEmpty(field("token"));
      if (sessionId && token) return { kind: "granted", sessionId, token, pairingCode: nonEmpty(field("pairing_code")) };
      return { kind: "authenticated" };
    }
    case "auth": {
      const result = field("result");
      if (result === "granted") {
        return {
          kind: "granted",
          sessionId: nonEmpty(field("session_id")),
          token: nonEmpty(field("token")),
          pairingCode: nonEmpty(field("pairing_code")),
        };
      }
      if (result === "denied") {
        return { kind: "denied", reason: reasonOf(field), pairingCode: nonEmpty(field("pairing_code")) };
      }
      return { kind: "other", status };
    }
    case "error":
      return { kind: "error", reason: reasonOf(field) };
    default:
      return { kind: "other", status: status ?? null };
  }
}

/**
 * An error reply to a session attempt either means the hub no longer knows the
 * session (pair again) or that it refuses this client.
 */
export function classifyErrorReason(reason: string): "stale" | "denied" {
  const normalized = reason.trim().toLowerCase();
  if (normalized.includes("expired")) return "stale";
  return STALE_REASONS.has(normalized) ? "stale" : "denied";
}

export function isAuthMessage(msg: HubMessage): msg is Exclude<HubMessage, OtherMessage> {
  return msg.kind !== "other";
}

function reasonOf(field: (name: string) => string | undefined): string {
  return nonEmpty(field("reason")) ?? nonEmpty(field("message")) ?? "unspecified";
}

/** Fields may sit at the top level or inside a `data` envelope. */
function fieldReader(msg: Record<string, unknown>): (name: string) => string | undefined {
  const data = isRecord(msg.data) ? msg.data : undefined;
  return (name) => {
    const top = msg[name];
    if (typeof top === "string") return top;
    const nested = data?.[name];
    return typeof nested === "string" ? nested : undefined;
  };
}

function nonEmpty(value: string | undefined): string | null {
  return value && value.length > 0 ? value : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}
