import type { InboundFrame, MessageChannel } from '../types/Channel.js';
import type { TransportHandle, TransportKind } from '../types/Terminal.js';
import { ChannelClosedError } from '../utils/errors.js';
import { pino } from 'pino';

export const silentLogger = pino({ level: 'silent' });

/** Transport whose output is scripted by the test; each emit is returned by one read. */
export class FakeTransport implements TransportHandle {
  alive = true;
  terminateCalls = 0;
  readonly written: string[] = [];
  readonly resizes: Array<[number, number]> = [];
  private readonly queue: Buffer[] = [];

  constructor(readonly kind: TransportKind = 'pty') {}

  get isAlive(): boolean {
    return this.alive;
  }

  emit(data: string | Buffer): void {
    this.queue.push(typeof data === 'string' ? Buffer.from(data) : data);
  }

  read(): Buffer {
    return this.queue.shift() ?? Buffer.alloc(0);
  }

  write(data: string): void {
    this.written.push(data);
  }

  resize(rows: number, cols: number): void {
    this.resizes.push([rows, cols]);
  }

  async terminate(): Promise<void> {
    this.terminateCalls++;
    this.alive = false;
  }
}

/** In-process stand-in for the browser connection. */
export class FakeChannel implements MessageChannel {
  readonly sent: Array<string | Buffer> = [];
  readonly closeCalls: Array<{ code?: number; reason?: string }> = [];
  failSends = false;

  private open = true;
  private readonly inbox: InboundFrame[] = [];
  private readonly waiters: Array<(frame: InboundFrame | null) => void> = [];
  private readonly listeners: Array<() => void> = [];

  get isOpen(): boolean {
    return this.open;
  }

  async send(payload: string | Buffer): Promise<void> {
    if (!this.open || this.failSends) {
      throw new ChannelClosedError();
    }
    this.sent.push(payload);
  }

  receive(): Promise<InboundFrame | null> {
    const next = this.inbox.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (!this.open) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    this.disconnect();
  }

  onClose(listener: () => void): void {
    this.listeners.push(listener);
  }

  /** Simulates a frame from the browser */
  push(frame: InboundFrame | object): void {
    const value = typeof frame === 'string' || Buffer.isBuffer(frame) ? frame : JSON.stringify(frame);
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(value);
    } else {
      this.inbox.push(value);
    }
  }

  /** Simulates the browser going away */
  disconnect(): void {
    if (!this.open) return;
    this.open = false;
    for (const waiter of this.waiters.splice(0)) waiter(null);
    for (const listener of this.listeners) listener();
  }

  /** JSON messages sent to the client */
  messages(): unknown[] {
    return this.sent
      .filter((payload): payload is string => typeof payload === 'string')
      .map((payload): unknown => JSON.parse(payload));
  }

  /** Binary frames sent to the client, joined */
  binaryOutput(): string {
    return this.sent
      .filter((payload): payload is Buffer => Buffer.isBuffer(payload))
      .map(payload => payload.toString('utf8'))
      .join('');
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(err: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
