/**
 * Endpoint cascade types.
 */
import type { HubConnection } from "../messaging/connection";
import type { SessionRecord } from "../session/types";

export type Candidate =
  | { kind: "direct"; url: string }
  | {
      kind: "relay";
      url: string;
      roomCode: string;
      /** Rooms derived from a stored session expect that hub to answer. */
      expectedHubIdentity?: string;
    }
  // a fresh relay room, registered only when the cascade reaches it
  | { kind: "relay_pairing"; url: string; relayUrl: string };

export interface ConnectOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/** Opens a transport to one candidate URL. Rejects with TransportError or AbortedError. */
export type Connector = (url: string, options: ConnectOptions) => Promise<HubConnection>;

/** Asks the relay for a new room and resolves to its code. */
export type RelayRegistrar = (
  relayUrl: string,
  options: { hostname: string; timeoutMs?: number; signal?: AbortSignal }
) => Promise<string>;

export type PairingFailure = "expired" | "timed_out" | "unbound";

export type CandidateResult =
  | { type: "authenticated"; connection: HubConnection; record: SessionRecord }
  | { type: "denied"; reason: string }
  | { type: "pairing_failed"; cause: Exclude<PairingFailure, "timed_out">; reason: string }
  | { type: "aborted" }
  // transport, protocol or pairing-timeout failure: the next candidate may be tried
  | { type: "failed"; reason: string; pairingTimedOut?: boolean };

export type CascadeResult =
  | { type: "authenticated"; connection: HubConnection; record: SessionRecord; candidate: Candidate }
  | { type: "denied"; reason: string; candidate: Candidate }
  | { type: "pairing_failed"; cause: PairingFailure; reason: string; candidate: Candidate }
  | { type: "aborted" }
  | { type: "exhausted"; failures: Array<{ candidate: string; reason: string }> };

export type CascadeEvents = {
  attempt: { candidate: Candidate; index: number; total: number };
  failed: { candidate: Candidate; reason: string };
  authenticated: { candidate: Candidate; hubIdentity: string };
};
