import { randomUUID } from 'crypto';
import { StringDecoder } from 'string_decoder';
import type { MessageChannel } from '../types/Channel.js';
import { parseClientMessage, type ClientMessage, type ServerMessage } from '../types/Protocol.js';
import type {
  BridgeInfo,
  BridgeState,
  StopReason,
  TerminalDimensions,
  TransportFactory,
  TransportHandle,
} from '../types/Terminal.js';
import { ChannelClosedError, describeError } from '../utils/errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { SessionRegistry } from './SessionRegistry.js';
import type { SshConnectParams } from './SshTransport.js';

/** Opens a remote shell for a bridge that was created before its transport */
export type RemoteConnector = (params: SshConnectParams) => Promise<TransportHandle>;

export interface TerminalBridgeOptions {
  id?: string;
  channel: MessageChannel;
  registry: SessionRegistry<TerminalBridge>;
  /** Interval between relay polls in ms */
  pollInterval?: number;
  /** Present on bridges that wait for a `connect` message */
  connector?: RemoteConnector;
  logger?: Logger;
}

const DEFAULT_POLL_INTERVAL = 10;

/** Terminal programs misbehave on a zero-sized window, so anything below 1 becomes 1. */
export function clampDimension(value: number): number {
  return Number.isFinite(value) ? Math.max(1, Math.floor(value)) : 1;
}

function isPromise<T>(value: T | Promise<T>): value is Promise<T> {
  return value instanceof Promise;
}

function closeCodeFor(reason: StopReason): number {
  switch (reason) {
    case 'shutdown':
      return 1001;
    case 'start-failed':
      return 1011;
    default:
      return 1000;
  }
}

/**
 * One browser connection relayed to one shell. The relay loop polls the
 * transport and forwards output in read order; inbound messages are applied
 * by the dispatch loop in run(). stop() tears everything down exactly once.
 */
export class TerminalBridge {
  readonly id: string;

  private state: BridgeState = 'idle';
  private transport: TransportHandle | null = null;
  private relayTimer: NodeJS.Timeout | null = null;
  private relaying = false;
  private stopping: Promise<void> | null = null;
  private stopReason: StopReason | undefined;
  private decoder: StringDecoder | null = null;

  private dimensions: TerminalDimensions = { cols: 80, rows: 24 };
  private bytesIn = 0;
  private bytesOut = 0;
  private readonly createdAt = new Date();
  private lastActivityAt = new Date();

  private readonly channel: MessageChannel;
  private readonly registry: SessionRegistry<TerminalBridge>;
  private readonly pollInterval: number;
  private readonly connector: RemoteConnector | undefined;
  private readonly log: Logger;

  constructor(options: TerminalBridgeOptions) {
    this.id = options.id || randomUUID();
    this.channel = options.channel;
    this.registry = options.registry;
    this.pollInterval = options.pollInterval || DEFAULT_POLL_INTERVAL;
    this.connector = options.connector;
    this.log = (options.logger || rootLogger).child({ sessionId: this.id });

    this.channel.onClose(() => {
      this.stop('client-disconnected').catch((err: unknown) => {
        this.log.error({ err }, 'Teardown after disconnect failed');
      });
    });
  }

  get currentState(): BridgeState {
    return this.state;
  }

  /**
   * Builds the transport and starts relaying. Resolves false if the session
   * did not become active; in that case the client has been told why and the
   * bridge is closed.
   */
  start(factory: TransportFactory): Promise<boolean> {
    return this.activate(factory, false);
  }

  /** Dispatch loop: applies inbound frames in arrival order until the client goes away. */
  async run(): Promise<void> {
    while (!this.isStopped()) {
      const frame = await this.channel.receive();
      if (frame === null) break;

      const message = parseClientMessage(frame);
      if (!message) {
        this.log.debug('Ignoring unrecognized message');
        continue;
      }
      await this.handleInboundMessage(message);
    }
    await this.stop('client-disconnected');
  }

  async handleInboundMessage(message: ClientMessage): Promise<void> {
    switch (message.type) {
      case 'input':
        this.handleInput(message.data);
        break;

      case 'resize':
        this.handleResize(message.rows, message.cols);
        break;

      case 'connect':
        await this.handleConnect({
          host: message.host,
          port: message.port,
          username: message.username,
          credential: message.credential,
        });
        break;
    }
  }

  stop(reason: StopReason = 'terminated'): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.teardown(reason);
    }
    return this.stopping;
  }

  info(): BridgeInfo {
    return {
      id: this.id,
      state: this.state,
      transport: this.transport?.kind ?? null,
      dimensions: { ...this.dimensions },
      bytesIn: this.bytesIn,
      bytesOut: this.bytesOut,
      createdAt: this.createdAt,
      lastActivityAt: this.lastActivityAt,
      stopReason: this.stopReason,
    };
  }

  private isStopped(): boolean {
    return this.stopping !== null;
  }

  private handleInput(data: string): void {
    const transport = this.transport;
    if (this.state !== 'active' || !transport) return;

    this.bytesIn += Buffer.byteLength(data);
    this.lastActivityAt = new Date();
    transport.write(data);
  }

  private handleResize(rows: number, cols: number): void {
    const transport = this.transport;
    if (this.state !== 'active' || !transport) return;

    this.dimensions = { rows: clampDimension(rows), cols: clampDimension(cols) };
    transport.resize(this.dimensions.rows, this.dimensions.cols);
  }

  private async handleConnect(params: SshConnectParams): Promise<void> {
    const connector = this.connector;
    if (!connector) {
      this.log.debug('Ignoring connect on a bridge without a remote connector');
      return;
    }
    if (this.state !== 'idle') {
      this.log.debug({ state: this.state }, 'Ignoring repeated connect');
      return;
    }

    this.log.info({ host: params.host, port: params.port, username: params.username }, 'Connecting to remote shell');
    await this.activate(() => connector(params), true);
  }

  private async activate(factory: TransportFactory, announce: boolean): Promise<boolean> {
    if (this.state !== 'idle' || this.isStopped()) {
      this.log.warn({ state: this.state }, 'Bridge already started');
      return false;
    }

    this.registry.register(this.id, this);

    let transport: TransportHandle;
    try {
      const result = factory();
      if (isPromise(result)) {
        this.state = 'connecting';
        transport = await result;
      } else {
        transport = result;
      }
    } catch (err) {
      this.log.warn({ err }, 'Failed to start transport');
      if (!this.isStopped()) {
        await this.sendMessage({ type: 'error', message: describeError(err) });
        await this.stop('start-failed');
      }
      return false;
    }

    if (this.isStopped()) {
      // The client left while the shell was being set up.
      await transport.terminate();
      return false;
    }

    this.transport = transport;
    this.state = 'active';
    this.decoder = transport.kind === 'ssh' ? new StringDecoder('utf8') : null;

    if (announce && !(await this.sendMessage({ type: 'connected' }))) {
      await this.stop('send-failed');
      return false;
    }

    this.log.info({ transport: transport.kind }, 'Session active');
    this.relayTimer = setInterval(() => {
      this.relayTick().catch((err: unknown) => {
        this.log.error({ err }, 'Relay tick failed');
      });
    }, this.pollInterval);
    return true;
  }

  /**
   * Drains whatever the transport has buffered, forwarding each chunk before
   * reading the next. Ticks never overlap.
   */
  private async relayTick(): Promise<void> {
    const transport = this.transport;
    if (this.relaying || this.state !== 'active' || !transport) return;

    this.relaying = true;
    try {
      for (;;) {
        const chunk = transport.read();
        if (chunk.length === 0) break;

        this.bytesOut += chunk.length;
        this.lastActivityAt = new Date();

        if (!(await this.sendOutput(chunk))) {
          await this.stop('send-failed');
          return;
        }
        if (this.isStopped()) return;
      }

      if (!transport.isAlive) {
        await this.stop('transport-exited');
      }
    } finally {
      this.relaying = false;
    }
  }

  private sendOutput(chunk: Buffer): Promise<boolean> {
    if (!this.decoder) {
      return this.send(chunk);
    }
    const data = this.decoder.write(chunk);
    if (data.length === 0) return Promise.resolve(true);
    return this.sendMessage({ type: 'output', data });
  }

  private sendMessage(message: ServerMessage): Promise<boolean> {
    return this.send(JSON.stringify(message));
  }

  private async send(payload: string | Buffer): Promise<boolean> {
    try {
      await this.channel.send(payload);
      return true;
    } catch (err) {
      if (err instanceof ChannelClosedError) {
        this.log.debug('Client gone, send dropped');
      } else {
        this.log.warn({ err }, 'Send to client failed');
      }
      return false;
    }
  }

  private async teardown(reason: StopReason): Promise<void> {
    this.stopReason = reason;
    this.state = 'closed';

    if (this.relayTimer) {
      clearInterval(this.relayTimer);
      this.relayTimer = null;
    }

    const transport = this.transport;
    if (transport) {
      try {
        await transport.terminate();
      } catch (err) {
        this.log.error({ err }, 'Transport terminate failed');
      }
    }

    this.registry.deregister(this.id, this);

    if (this.channel.isOpen) {
      this.channel.close(closeCodeFor(reason), reason);
    }

    this.log.info({ reason, bytesIn: this.bytesIn, bytesOut: this.bytesOut }, 'Session closed');
  }
}
