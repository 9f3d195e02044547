/**
 * Auth state machine for one freshly opened hub connection.
 *
 *   AwaitingChallenge -> SessionAttempt | PairingAttempt -> terminal outcome
 *
 * The hub speaks first with an identity-bearing challenge. A valid stored
 * session for that identity is offered; a stale one falls through to pairing.
 * Store write failures are logged, never turned into an auth failure.
 */
import { errorMessage } from "../errors";
import { createLogger } from "../logger";
import type { HubConnection } from "../messaging/connection";
import { createMessageInbox, type MessageInbox } from "../messaging/inbox";
import type { PairingNegotiator } from "../pairing/negotiator";
import { classifyErrorReason, encodeClientMessage, sessionAuthMessage } from "../protocols/hubAuth";
import { touch } from "../session/expiry";
import type { SessionStore } from "../session/store";
import type { SessionRecord } from "../session/types";
import { CHALLENGE_TIMEOUT_MS, VERDICT_TIMEOUT_MS, type AuthOutcome } from "./types";

const log = createLogger("auth");

export interface AuthenticateOptions {
  store: SessionStore;
  negotiator: PairingNegotiator;
  signal?: AbortSignal;
  challengeTimeoutMs?: number;
  verdictTimeoutMs?: number;
  now?: () => number;
  /** Set for relay rooms named after a known hub. */
  expectedHubIdentity?: string;
}

const CLOSED: AuthOutcome = { kind: "protocol_error", reason: "connection closed" };
const ABORTED: AuthOutcome = { kind: "timed_out", cause: "aborted" };

export async function authenticate(connection: HubConnection, options: AuthenticateOptions): Promise<AuthOutcome> {
  const inbox = createMessageInbox(connection);
  try {
    const outcome = await run(connection, inbox, options);
    log.debug("Auth finished", { endpoint: connection.endpoint, outcome: outcome.kind });
    return outcome;
  } finally {
    inbox.dispose();
  }
}

async function run(connection: HubConnection, inbox: MessageInbox, options: AuthenticateOptions): Promise<AuthOutcome> {
  const { store, signal } = options;
  const clock = options.now ?? Date.now;

  const first = await inbox.next({ timeoutMs: options.challengeTimeoutMs ?? CHALLENGE_TIMEOUT_MS, signal });
  if (first.type === "aborted") return ABORTED;
  if (first.type === "timeout") return { kind: "protocol_error", reason: "no challenge" };
  if (first.type === "closed") return CLOSED;
  if (first.message.kind !== "challenge") {
    return { kind: "protocol_error", reason: `unexpected ${first.message.kind} before challenge` };
  }
  const hubIdentity = first.message.hubIdentity;
  if (!hubIdentity) return { kind: "protocol_error", reason: "challenge without hub identity" };
  if (options.expectedHubIdentity && options.expectedHubIdentity !== hubIdentity) {
    log.warn("Hub identity mismatch", { expected: options.expectedHubIdentity, received: hubIdentity });
    return { kind: "protocol_error", reason: "hub identity mismatch" };
  }

  const stored = store.get(hubIdentity);
  if (stored) {
    const attempt = await trySession(connection, inbox, stored, options, clock);
    if (attempt !== "stale") return attempt;
    log.info("Stored session no longer accepted, pairing again", { hubIdentity });
  } else {
    log.info("No valid session for hub, pairing", { hubIdentity });
  }

  if (signal?.aborted) return ABORTED;
  const paired = await options.negotiator.pair(connection, inbox, { hubIdentity, signal });
  switch (paired.kind) {
    case "approved": {
      const record: SessionRecord = {
        sessionId: paired.sessionId,
        token: paired.token,
        hubIdentity,
        clientHostname: paired.hostname,
        lastActivity: paired.approvedAt,
      };
      await persist(() => store.upsert(record), hubIdentity);
      return { kind: "authenticated", record, via: "pairing" };
    }
    case "denied":
      return { kind: "denied", reason: paired.reason };
    case "expired":
      return { kind: "expired", reason: paired.reason };
    case "timed_out":
      return { kind: "timed_out", cause: paired.cause };
    case "unbound":
      return { kind: "unbound", reason: paired.reason };
    case "closed":
      return CLOSED;
    case "protocol_error":
      return { kind: "protocol_error", reason: paired.reason };
  }
}

async function trySession(
  connection: HubConnection,
  inbox: MessageInbox,
  stored: SessionRecord,
  options: AuthenticateOptions,
  clock: () => number
): Promise<AuthOutcome | "stale"> {
  const { store, signal } = options;
  const { hubIdentity } = stored;
  if (signal?.aborted) return ABORTED;

  try {
    await connection.send(encodeClientMessage(sessionAuthMessage(stored.sessionId)));
  } catch (err) {
    log.debug("Session auth send failed", { error: errorMessage(err) });
    return CLOSED;
  }

  const deadline = Date.now() + (options.verdictTimeoutMs ?? VERDICT_TIMEOUT_MS);
  for (;;) {
    const verdict = await inbox.next({ timeoutMs: Math.max(0, deadline - Date.now()), signal });
    if (verdict.type === "aborted") return ABORTED;
    if (verdict.type === "timeout") return { kind: "protocol_error", reason: "no session verdict" };
    if (verdict.type === "closed") return CLOSED;

    const msg = verdict.message;
    switch (msg.kind) {
      case "authenticated": {
        const refreshed = await persist(() => store.refresh(hubIdentity), hubIdentity);
        return { kind: "authenticated", record: refreshed ?? touch(stored, clock()), via: "session" };
      }
      case "granted": {
        if (!msg.sessionId || !msg.token) {
          const refreshed = await persist(() => store.refresh(hubIdentity), hubIdentity);
          return { kind: "authenticated", record: refreshed ?? touch(stored, clock()), via: "session" };
        }
        // the hub rotated the credentials
        const record: SessionRecord = {
          ...stored,
          sessionId: msg.sessionId,
          token: msg.token,
          lastActivity: Math.max(stored.lastActivity, clock()),
        };
        await persist(() => store.upsert(record), hubIdentity);
        return { kind: "authenticated", record, via: "session" };
      }
      case "denied":
        return { kind: "denied", reason: msg.reason };
      case "error":
        if (classifyErrorReason(msg.reason) === "stale") return "stale";
        return { kind: "denied", reason: msg.reason };
      case "challenge":
        log.debug("Ignoring repeated challenge", { hubIdentity });
        continue;
    }
  }
}

async function persist<T>(write: () => Promise<T>, hubIdentity: string): Promise<T | undefined> {
  try {
    return await write();
  } catch (err) {
    log.warn("Could not persist session", { hubIdentity, error: errorMessage(err) });
    return undefined;
  }
}
