export const PAIRING_TIMEOUT_MS = 5 * 60 * 1000;

/** Lives only for one pairing attempt; never persisted. */
export interface PendingPairing {
  code: string;
  hostname: string;
  createdAt: number;
}

export type PairingState =
  | "generating_code"
  | "awaiting_approval"
  | "approved"
  | "denied"
  | "expired"
  | "timed_out";

export type PairingResult =
  | { kind: "approved"; sessionId: string; token: string; hostname: string; approvedAt: number }
  | { kind: "denied"; reason: string }
  // the hub dropped the code before a human answered
  | { kind: "expired"; reason: string }
  | { kind: "timed_out"; cause: "timeout" | "aborted" }
  // approved, but the hub sent nothing to store
  | { kind: "unbound"; reason: string }
  | { kind: "closed"; reason: string }
  | { kind: "protocol_error"; reason: string };

export type PairingEvents = {
  state: { state: PairingState; pending?: PendingPairing };
};
