/**
 * Endpoint cascade: try each candidate in order until one authenticates.
 *
 * Transport failures, protocol failures and pairing timeouts move on to the
 * next candidate. A denial, a code the hub expired, an approval without
 * credentials or an abort ends the cascade.
 */
import { authenticate } from "../auth/authenticator";
import { AbortedError, errorMessage } from "../errors";
import { TypedEventEmitter } from "../events";
import { createLogger } from "../logger";
import type { HubConnection } from "../messaging/connection";
import { localHostname } from "../pairing/code";
import type { PairingNegotiator } from "../pairing/negotiator";
import type { SessionStore } from "../session/store";
import { CONNECT_TIMEOUT_MS } from "./constants";
import { describeCandidate, relayRoomUrl } from "./endpoints";
import { registerRelayRoom } from "./relayRegistration";
import type { Candidate, CandidateResult, CascadeEvents, CascadeResult, Connector, RelayRegistrar } from "./types";

const log = createLogger("cascade");

export interface EndpointCascadeOptions {
  connect: Connector;
  store: SessionStore;
  negotiator: PairingNegotiator;
  registerRelay?: RelayRegistrar;
  /** Sent to the relay when registering a room. */
  hostname?: string;
  connectTimeoutMs?: number;
  challengeTimeoutMs?: number;
  verdictTimeoutMs?: number;
  now?: () => number;
}

export interface EndpointCascade {
  tryCandidate(candidate: Candidate, signal?: AbortSignal): Promise<CandidateResult>;
  run(candidates: Candidate[], signal?: AbortSignal): Promise<CascadeResult>;
  on<K extends keyof CascadeEvents>(event: K, cb: (payload: CascadeEvents[K]) => void): () => void;
}

export function createEndpointCascade(options: EndpointCascadeOptions): EndpointCascade {
  const events = new TypedEventEmitter<CascadeEvents>();
  const connectTimeoutMs = options.connectTimeoutMs ?? CONNECT_TIMEOUT_MS;

  async function resolveUrl(candidate: Candidate, signal?: AbortSignal): Promise<string> {
    if (candidate.kind !== "relay_pairing") return candidate.url;
    const register = options.registerRelay ?? registerRelayRoom;
    const roomCode = await register(candidate.relayUrl, {
      hostname: options.hostname ?? localHostname(),
      timeoutMs: connectTimeoutMs,
      signal,
    });
    log.info("Registered relay room", { relay: describeCandidate(candidate) });
    return relayRoomUrl(candidate.relayUrl, roomCode);
  }

  async function tryCandidate(candidate: Candidate, signal?: AbortSignal): Promise<CandidateResult> {
    if (signal?.aborted) return { type: "aborted" };

    let connection: HubConnection;
    try {
      const url = await resolveUrl(candidate, signal);
      connection = await options.connect(url, { timeoutMs: connectTimeoutMs, signal });
    } catch (err) {
      if (err instanceof AbortedError || signal?.aborted) return { type: "aborted" };
      return { type: "failed", reason: errorMessage(err) };
    }

    const outcome = await authenticate(connection, {
      store: options.store,
      negotiator: options.negotiator,
      signal,
      challengeTimeoutMs: options.challengeTimeoutMs,
      verdictTimeoutMs: options.verdictTimeoutMs,
      now: options.now,
      expectedHubIdentity: candidate.kind === "relay" ? candidate.expectedHubIdentity : undefined,
    });
    if (outcome.kind === "authenticated") {
      return { type: "authenticated", connection, record: outcome.record };
    }

    await closeQuietly(connection, outcome.kind);
    switch (outcome.kind) {
      case "denied":
        return { type: "denied", reason: outcome.reason };
      case "expired":
        return { type: "pairing_failed", cause: "expired", reason: outcome.reason };
      case "unbound":
        return { type: "pairing_failed", cause: "unbound", reason: outcome.reason };
      case "timed_out":
        return outcome.cause === "aborted"
          ? { type: "aborted" }
          : { type: "failed", reason: "pairing approval timed out", pairingTimedOut: true };
      case "protocol_error":
        return { type: "failed", reason: outcome.reason };
    }
  }

  async function run(candidates: Candidate[], signal?: AbortSignal): Promise<CascadeResult> {
    const failures: Array<{ candidate: string; reason: string }> = [];
    let pairingTimeout: Candidate | undefined;
    for (const [index, candidate] of candidates.entries()) {
      events.emit("attempt", { candidate, index, total: candidates.length });
      log.info("Trying endpoint", { endpoint: describeCandidate(candidate), attempt: index + 1, of: candidates.length });

      const result = await tryCandidate(candidate, signal);
      switch (result.type) {
        case "authenticated":
          log.info("Authenticated", { endpoint: describeCandidate(candidate), hubIdentity: result.record.hubIdentity });
          events.emit("authenticated", { candidate, hubIdentity: result.record.hubIdentity });
          return { ...result, candidate };
        case "denied":
          log.warn("Hub denied this client", { endpoint: describeCandidate(candidate), reason: result.reason });
          return { ...result, candidate };
        case "pairing_failed":
          log.warn("Pairing did not complete", { endpoint: describeCandidate(candidate), reason: result.reason });
          return { ...result, candidate };
        case "aborted":
          log.info("Connection attempt aborted");
          return result;
        case "failed":
          log.info("Endpoint failed", { endpoint: describeCandidate(candidate), reason: result.reason });
          failures.push({ candidate: describeCandidate(candidate), reason: result.reason });
          if (result.pairingTimedOut) pairingTimeout = candidate;
          events.emit("failed", { candidate, reason: result.reason });
          continue;
      }
    }
    if (pairingTimeout) {
      return { type: "pairing_failed", cause: "timed_out", reason: "pairing approval timed out", candidate: pairingTimeout };
    }
    return { type: "exhausted", failures };
  }

  return {
    tryCandidate,
    run,
    on: (event, cb) => events.on(event, cb),
  };
}

async function closeQuietly(connection: HubConnection, reason: string) {
  try {
    await connection.close(reason);
  } catch (err) {
    log.debug("Close failed", { endpoint: connection.endpoint, error: errorMessage(err) });
  }
}
