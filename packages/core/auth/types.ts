import type { SessionRecord } from "../session/types";

/**
 * Terminal result of authenticating one connection.
 */
export type AuthOutcome =
  | { kind: "authenticated"; record: SessionRecord; via: "session" | "pairing" }
  | { kind: "denied"; reason: string }
  // pairing code lapsed on the hub
  | { kind: "expired"; reason: string }
  | { kind: "timed_out"; cause: "timeout" | "aborted" }
  // pairing approved without session credentials
  | { kind: "unbound"; reason: string }
  | { kind: "protocol_error"; reason: string };

export const CHALLENGE_TIMEOUT_MS = 5_000;
export const VERDICT_TIMEOUT_MS = 10_000;
