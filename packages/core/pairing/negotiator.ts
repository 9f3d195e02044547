/**
 * One-time-code pairing over an already-open hub connection.
 *
 * GeneratingCode -> AwaitingApproval -> Approved | Denied | TimedOut.
 * Waiting suspends on the connection's inbox; nothing is sent after an abort.
 */
import * as log from "../logger";
import { errorMessage } from "../errors";
import { TypedEventEmitter } from "../events";
import type { HubConnection } from "../messaging/connection";
import type { MessageInbox } from "../messaging/inbox";
import { encodeClientMessage, pairingRequestMessage } from "../protocols/hubAuth";
import { generatePairingCode, localHostname } from "./code";
import type { PairingDisplay } from "./render";
import {
  PAIRING_TIMEOUT_MS,
  type PairingEvents,
  type PairingResult,
  type PairingState,
  type PendingPairing,
} from "./types";

export interface PairingNegotiator {
  pair(
    connection: HubConnection,
    inbox: MessageInbox,
    options: { hubIdentity: string; signal?: AbortSignal }
  ): Promise<PairingResult>;
  on<K extends keyof PairingEvents>(event: K, cb: (payload: PairingEvents[K]) => void): () => void;
}

export function createPairingNegotiator(options: {
  hostname?: string;
  display?: PairingDisplay;
  timeoutMs?: number;
  now?: () => number;
  generateCode?: () => string;
} = {}): PairingNegotiator {
  const clock = options.now ?? Date.now;
  const timeoutMs = options.timeoutMs ?? PAIRING_TIMEOUT_MS;
  const generateCode = options.generateCode ?? generatePairingCode;
  const events = new TypedEventEmitter<PairingEvents>();

  function transition(state: PairingState, pending?: PendingPairing) {
    log.debug("Pairing state", { state });
    events.emit("state", { state, pending });
  }

  function unbound(pending: PendingPairing): PairingResult {
    log.warn("Hub approved pairing without session credentials; nothing will be stored");
    transition("approved", pending);
    return { kind: "unbound", reason: "approval without session credentials" };
  }

  async function pair(
    connection: HubConnection,
    inbox: MessageInbox,
    { hubIdentity, signal }: { hubIdentity: string; signal?: AbortSignal }
  ): Promise<PairingResult> {
    transition("generating_code");
    const pending: PendingPairing = {
      code: generateCode(),
      hostname: options.hostname ?? localHostname(),
      createdAt: clock(),
    };

    if (signal?.aborted) {
      transition("timed_out", pending);
      return { kind: "timed_out", cause: "aborted" };
    }

    if (options.display) {
      try {
        await options.display({ code: pending.code, hostname: pending.hostname, hubIdentity });
      } catch (err) {
        log.warn("Pairing prompt could not be displayed", { error: errorMessage(err) });
      }
    }
    if (signal?.aborted) {
      transition("timed_out", pending);
      return { kind: "timed_out", cause: "aborted" };
    }

    try {
      await connection.send(encodeClientMessage(pairingRequestMessage(pending.code, pending.hostname)));
    } catch (err) {
      return { kind: "closed", reason: errorMessage(err) };
    }
    transition("awaiting_approval", pending);
    log.info("Pairing request sent", { hubIdentity, hostname: pending.hostname });

    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const result = await inbox.next({ timeoutMs: Math.max(0, deadline - Date.now()), signal });
      if (result.type === "timeout" || result.type === "aborted") {
        transition("timed_out", pending);
        return { kind: "timed_out", cause: result.type === "timeout" ? "timeout" : "aborted" };
      }
      if (result.type === "closed") {
        return { kind: "closed", reason: result.reason };
      }

      const msg = result.message;
      switch (msg.kind) {
        case "granted": {
          if (msg.pairingCode && msg.pairingCode !== pending.code) {
            log.debug("Ignoring approval for another pairing code");
            continue;
          }
          if (!msg.sessionId || !msg.token) return unbound(pending);
          transition("approved", pending);
          return {
            kind: "approved",
            sessionId: msg.sessionId,
            token: msg.token,
            hostname: pending.hostname,
            approvedAt: clock(),
          };
        }
        case "authenticated":
          return unbound(pending);
        case "denied":
          if (msg.pairingCode && msg.pairingCode !== pending.code) {
            log.debug("Ignoring denial for another pairing code");
            continue;
          }
          transition("denied", pending);
          return { kind: "denied", reason: msg.reason };
        case "error":
          if (msg.reason.toLowerCase().includes("expired")) {
            transition("expired", pending);
            return { kind: "expired", reason: msg.reason };
          }
          transition("denied", pending);
          return { kind: "denied", reason: msg.reason };
        case "challenge":
          log.debug("Ignoring repeated challenge while pairing");
          continue;
      }
    }
  }

  return {
    pair,
    on: (event, cb) => events.on(event, cb),
  };
}
