import WebSocket, { type RawData } from "ws";
import { AbortedError, TransportError } from "../errors";
import { createLogger } from "../logger";
import type { CloseInfo, HubConnection } from "../messaging/connection";
import { CONNECT_TIMEOUT_MS } from "./constants";
import type { ConnectOptions } from "./types";

const log = createLogger("ws");

const CLOSE_GRACE_MS = 1_000;

/**
 * Open a WebSocket to `url` and resolve once it is open.
 * The connect phase is bounded by `timeoutMs`; aborting it terminates the socket.
 */
export function connectWebSocket(url: string, options: ConnectOptions = {}): Promise<HubConnection> {
  const timeoutMs = options.timeoutMs ?? CONNECT_TIMEOUT_MS;
  const { signal } = options;
  if (signal?.aborted) return Promise.reject(new AbortedError());

  return new Promise<HubConnection>((resolve, reject) => {
    let socket: WebSocket;
    try {
      socket = new WebSocket(url, { perMessageDeflate: false });
    } catch (err) {
      reject(new TransportError(`Invalid endpoint ${url}`, "transport_failed", err));
      return;
    }
    // attached before open so the hub's first frame is never missed
    const connection = wrapSocket(socket, url);
    let settled = false;

    const settle = (err: Error | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      socket.off("open", onOpen);
      offClose();
      if (err) {
        socket.terminate();
        reject(err);
        return;
      }
      log.debug("Connected", { url });
      resolve(connection);
    };

    const onOpen = () => settle(null);
    const onAbort = () => settle(new AbortedError());
    const timer = setTimeout(
      () => settle(new TransportError(`Timed out connecting to ${url}`, "connect_timeout")),
      timeoutMs
    );
    const offClose = connection.onClose(({ reason }) =>
      settle(new TransportError(`Could not connect to ${url}: ${reason}`, "transport_failed"))
    );
    socket.once("open", onOpen);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

function wrapSocket(socket: WebSocket, endpoint: string): HubConnection {
  const messageHandlers = new Set<(text: string) => void>();
  const closeHandlers = new Set<(info: CloseInfo) => void>();
  const buffered: string[] = [];
  let closed: CloseInfo | null = null;

  const finish = (info: CloseInfo) => {
    if (closed) return;
    closed = info;
    for (const h of [...closeHandlers]) h(info);
    closeHandlers.clear();
  };

  socket.on("message", (raw: RawData, isBinary: boolean) => {
    if (isBinary) {
      log.debug("Ignoring binary frame", { endpoint });
      return;
    }
    const text = decodeText(raw);
    if (messageHandlers.size === 0) {
      buffered.push(text);
      return;
    }
    for (const h of [...messageHandlers]) h(text);
  });
  socket.on("close", (code: number, reason: Buffer) => {
    finish({ code, reason: reason.toString("utf8") || `closed with code ${code}` });
  });
  socket.on("error", (err: Error) => {
    log.debug("Socket error", { endpoint, error: err.message });
    finish({ reason: err.message });
  });

  return {
    endpoint,
    send(text) {
      return new Promise<void>((resolve, reject) => {
        if (socket.readyState !== WebSocket.OPEN) {
          reject(new TransportError(`Connection to ${endpoint} is not open`, "connection_closed"));
          return;
        }
        socket.send(text, (err) => {
          if (err) {
            reject(new TransportError(`Send to ${endpoint} failed`, "transport_failed", err));
            return;
          }
          resolve();
        });
      });
    },
    onMessage(cb) {
      messageHandlers.add(cb);
      for (const text of buffered.splice(0)) cb(text);
      return () => {
        messageHandlers.delete(cb);
      };
    },
    onClose(cb) {
      if (closed) {
        cb(closed);
        return () => undefined;
      }
      closeHandlers.add(cb);
      return () => {
        closeHandlers.delete(cb);
      };
    },
    isOpen() {
      return socket.readyState === WebSocket.OPEN;
    },
    close(reason = "client closing") {
      if (socket.readyState === WebSocket.CLOSED) return Promise.resolve();
      return new Promise<void>((resolve) => {
        const timer = setTimeout(() => socket.terminate(), CLOSE_GRACE_MS);
        socket.once("close", () => {
          clearTimeout(timer);
          resolve();
        });
        if (socket.readyState === WebSocket.OPEN) {
          socket.close(1000, truncateCloseReason(reason));
        } else {
          socket.terminate();
        }
      });
    },
  };
}

// close frames carry at most 123 bytes of UTF-8 reason
const MAX_CLOSE_REASON_BYTES = 123;

export function truncateCloseReason(reason: string): string {
  if (Buffer.byteLength(reason, "utf8") <= MAX_CLOSE_REASON_BYTES) return reason;
  let out = "";
  let bytes = 0;
  for (const char of reason) {
    const size = Buffer.byteLength(char, "utf8");
    if (bytes + size > MAX_CLOSE_REASON_BYTES) break;
    out += char;
    bytes += size;
  }
  return out;
}

function decodeText(raw: RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  return Buffer.from(raw).toString("utf8");
}
