/**
 * Error taxonomy for connecting to and authenticating with a hub.
 *
 * `recoverable` tells the endpoint cascade whether the next candidate may be tried.
 */

export type ErrorCategory = "transport" | "protocol" | "auth" | "storage" | "config" | "cancelled";

export type HubAuthErrorCode =
  | "transport_failed"
  | "connect_timeout"
  | "connection_closed"
  | "protocol_error"
  | "denied"
  | "pairing_timed_out"
  | "pairing_expired"
  | "pairing_unbound"
  | "aborted"
  | "cascade_exhausted"
  | "storage_failed"
  | "lock_timeout"
  | "config_invalid";

export class HubAuthError extends Error {
  constructor(
    message: string,
    public readonly code: HubAuthErrorCode,
    public readonly category: ErrorCategory,
    public readonly recoverable: boolean,
    public override readonly cause?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      recoverable: this.recoverable,
    };
  }

  static is(value: unknown): value is HubAuthError {
    return value instanceof HubAuthError;
  }
}

export class TransportError extends HubAuthError {
  constructor(message: string, code: "transport_failed" | "connect_timeout" | "connection_closed" = "transport_failed", cause?: unknown) {
    super(message, code, "transport", true, cause);
  }
}

export class ProtocolError extends HubAuthError {
  constructor(message: string, cause?: unknown) {
    super(message, "protocol_error", "protocol", true, cause);
  }
}

export class DeniedError extends HubAuthError {
  constructor(public readonly reason: string) {
    super(`Authentication denied: ${reason}`, "denied", "auth", false);
  }
}

export class PairingTimedOutError extends HubAuthError {
  constructor(message = "Pairing timed out, retry to get a new code", code: "pairing_timed_out" | "pairing_expired" = "pairing_timed_out") {
    super(message, code, "auth", false);
  }
}

export class PairingUnboundError extends HubAuthError {
  constructor(message = "The hub approved pairing but sent no session credentials") {
    super(message, "pairing_unbound", "auth", false);
  }
}

export class AbortedError extends HubAuthError {
  constructor(message = "Operation aborted") {
    super(message, "aborted", "cancelled", false);
  }
}

export class StorageError extends HubAuthError {
  constructor(message: string, code: "storage_failed" | "lock_timeout" = "storage_failed", cause?: unknown) {
    super(message, code, "storage", true, cause);
  }
}

export class ConfigError extends HubAuthError {
  constructor(message: string, cause?: unknown) {
    super(message, "config_invalid", "config", false, cause);
  }
}

export class CascadeExhaustedError extends HubAuthError {
  constructor(public readonly failures: ReadonlyArray<{ candidate: string; reason: string }>) {
    super(
      failures.length === 0
        ? "No hub endpoints configured"
        : `Could not reach the hub on any endpoint (${failures.map((f) => `${f.candidate}: ${f.reason}`).join("; ")})`,
      "cascade_exhausted",
      "transport",
      true,
    );
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
