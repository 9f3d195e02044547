import { AbortedError, TransportError, errorMessage } from "../errors";
import { createLogger } from "../logger";
import { CONNECT_TIMEOUT_MS } from "./constants";
import { relayApiUrl } from "./endpoints";
import type { RelayRegistrar } from "./types";

const log = createLogger("relay");

/**
 * `POST <relay>/api/pair` with this client's hostname; the relay answers
 * `{ "code": "<room>" }` and the client then joins `/ws?role=client&code=<room>`.
 */
export const registerRelayRoom: RelayRegistrar = async (relayUrl, { hostname, timeoutMs, signal }) => {
  if (signal?.aborted) throw new AbortedError();
  const endpoint = relayApiUrl(relayUrl, "/api/pair");
  const limit = timeoutMs ?? CONNECT_TIMEOUT_MS;

  const controller = new AbortController();
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });
  const timer = setTimeout(() => controller.abort(), limit);

  try {
    const response = await fetch(endpoint, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify({ hostname }),
      signal: controller.signal,
    });
    if (!response.ok) {
      throw new TransportError(`Relay returned status ${response.status}`);
    }
    const body: unknown = await response.json();
    const code = isRecord(body) && typeof body.code === "string" ? body.code.trim() : "";
    if (!code) throw new TransportError("Relay response missing room code");
    log.debug("Registered relay room", { relay: new URL(endpoint).host });
    return code;
  } catch (err) {
    if (signal?.aborted) throw new AbortedError();
    if (err instanceof TransportError) throw err;
    if (controller.signal.aborted) {
      throw new TransportError(`Relay registration timed out after ${limit}ms`, "connect_timeout");
    }
    throw new TransportError(`Failed to register with relay: ${errorMessage(err)}`, "transport_failed", err);
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}
