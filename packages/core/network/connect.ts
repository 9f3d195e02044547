import type { HubPairConfig } from "../config/config";
import {
  AbortedError,
  CascadeExhaustedError,
  DeniedError,
  PairingTimedOutError,
  PairingUnboundError,
} from "../errors";
import { createPairingNegotiator, type PairingNegotiator } from "../pairing/negotiator";
import type { PairingDisplay } from "../pairing/render";
import type { SessionStore } from "../session/store";
import { createEndpointCascade, type EndpointCascade } from "./cascade";
import { buildCandidates } from "./endpoints";
import { createHubSession, type HubSession } from "./hubSession";
import type { Connector, PairingFailure, RelayRegistrar } from "./types";
import { connectWebSocket } from "./wsConnector";

export interface ConnectToHubOptions {
  config: Pick<
    HubPairConfig,
    "directUrls" | "relayUrl" | "relayCode" | "connectTimeoutMs" | "challengeTimeoutMs" | "verdictTimeoutMs" | "pairingTimeoutMs"
  >;
  store: SessionStore;
  display?: PairingDisplay;
  negotiator?: PairingNegotiator;
  connect?: Connector;
  registerRelay?: RelayRegistrar;
  signal?: AbortSignal;
  now?: () => number;
  /** Called before the first attempt, to subscribe to cascade events. */
  onCascade?: (cascade: EndpointCascade) => void;
}

/**
 * Load sessions, walk the candidate list and return the first authenticated session.
 *
 * Throws DeniedError, PairingTimedOutError, PairingUnboundError, AbortedError
 * or CascadeExhaustedError. A pairing timeout is only thrown once every
 * candidate after it has failed too.
 */
export async function connectToHub(options: ConnectToHubOptions): Promise<HubSession> {
  const { config, store, signal } = options;
  await store.load();

  const negotiator =
    options.negotiator ??
    createPairingNegotiator({ display: options.display, timeoutMs: config.pairingTimeoutMs, now: options.now });
  const cascade = createEndpointCascade({
    connect: options.connect ?? connectWebSocket,
    registerRelay: options.registerRelay,
    store,
    negotiator,
    connectTimeoutMs: config.connectTimeoutMs,
    challengeTimeoutMs: config.challengeTimeoutMs,
    verdictTimeoutMs: config.verdictTimeoutMs,
    now: options.now,
  });
  options.onCascade?.(cascade);

  const known = store.list().map((record) => record.hubIdentity);
  const result = await cascade.run(buildCandidates(config, known), signal);
  switch (result.type) {
    case "authenticated":
      return createHubSession({
        connection: result.connection,
        candidate: result.candidate,
        record: result.record,
        store,
        now: options.now,
      });
    case "denied":
      throw new DeniedError(result.reason);
    case "pairing_failed":
      throw pairingError(result.cause);
    case "aborted":
      throw new AbortedError();
    case "exhausted":
      throw new CascadeExhaustedError(result.failures);
  }
}

function pairingError(cause: PairingFailure) {
  switch (cause) {
    case "expired":
      return new PairingTimedOutError("Pairing code expired on the hub, retry to get a new code", "pairing_expired");
    case "timed_out":
      return new PairingTimedOutError();
    case "unbound":
      return new PairingUnboundError();
  }
}
