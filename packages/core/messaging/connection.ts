export type CloseInfo = { code?: number; reason: string };

/**
 * An open, ordered, reliable text message stream to a hub.
 *
 * Implementations (WebSocket today) live in network/; the auth flow depends only on this port.
 */
export interface HubConnection {
  /** Where this connection goes, for logs and error reports. */
  readonly endpoint: string;

  send(text: string): Promise<void>;

  /**
   * Subscribe to inbound frames. Frames received before the first subscriber are
   * buffered and delivered to it. Returns an unsubscribe function.
   */
  onMessage(cb: (text: string) => void): () => void;

  /** Fires once, after a remote close, a local close or a socket error. */
  onClose(cb: (info: CloseInfo) => void): () => void;

  isOpen(): boolean;
  close(reason?: string): Promise<void>;
}
