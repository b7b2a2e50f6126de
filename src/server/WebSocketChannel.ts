import { WebSocket, type RawData } from 'ws';
import type { InboundFrame, MessageChannel } from '../types/Channel.js';
import { ChannelClosedError } from '../utils/errors.js';

function toFrame(data: RawData, isBinary: boolean): InboundFrame {
  const buffer = Array.isArray(data)
    ? Buffer.concat(data)
    : Buffer.isBuffer(data)
      ? data
      : Buffer.from(data);
  return isBinary ? buffer : buffer.toString('utf8');
}

/** The slice of a `ws` WebSocket the channel uses */
export interface SocketLike {
  readonly readyState: number;
  send(data: string | Buffer, options: { binary: boolean }, cb: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): this;
  on(event: 'close', listener: () => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

/**
 * MessageChannel over a `ws` socket. Inbound frames are queued until
 * receive() asks for them, so no message is lost between two receives.
 */
export class WebSocketChannel implements MessageChannel {
  private readonly inbox: InboundFrame[] = [];
  private readonly waiters: Array<(frame: InboundFrame | null) => void> = [];
  private readonly closeListeners = new Set<() => void>();
  private closed = false;

  constructor(private readonly ws: SocketLike) {
    ws.on('message', (data: RawData, isBinary: boolean) => {
      const frame = toFrame(data, isBinary);
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(frame);
      } else {
        this.inbox.push(frame);
      }
    });

    ws.on('close', () => this.markClosed());
    ws.on('error', () => this.markClosed());
  }

  get isOpen(): boolean {
    return !this.closed && this.ws.readyState === WebSocket.OPEN;
  }

  send(payload: string | Buffer): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(new ChannelClosedError());
    }

    return new Promise((resolve, reject) => {
      this.ws.send(payload, { binary: typeof payload !== 'string' }, (err) => {
        if (err) {
          reject(new ChannelClosedError(`Client send failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  receive(): Promise<InboundFrame | null> {
    const next = this.inbox.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(code = 1000, reason = ''): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(code, reason);
    }
    this.markClosed();
  }

  onClose(listener: () => void): void {
    if (this.closed) {
      listener();
      return;
    }
    this.closeListeners.add(listener);
  }

  private markClosed(): void {
    if (this.closed) return;
    this.closed = true;

    for (const waiter of this.waiters.splice(0)) {
      waiter(null);
    }
    for (const listener of this.closeListeners) {
      listener();
    }
    this.closeListeners.clear();
  }
}
