/** One frame received from the browser */
export type InboundFrame = string | Buffer;

/**
 * Bidirectional, message-oriented link to the browser. Owned by the server;
 * a bridge borrows it for its lifetime.
 */
export interface MessageChannel {
  readonly isOpen: boolean;
  /** Resolves once the frame is handed to the socket; rejects with ChannelClosedError if the peer is gone. */
  send(payload: string | Buffer): Promise<void>;
  /** Next inbound frame, or null once the channel has closed. */
  receive(): Promise<InboundFrame | null>;
  close(code?: number, reason?: string): void;
  onClose(listener: () => void): void;
}
