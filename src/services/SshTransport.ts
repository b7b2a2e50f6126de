import { Client, type ClientChannel, type ConnectConfig } from 'ssh2';
import type { TransportHandle } from '../types/Terminal.js';
import { ConnectError, errorMessage } from '../utils/errors.js';
import { OutputQueue } from '../utils/OutputQueue.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { KnownHosts, type HostKeyPolicy } from './KnownHosts.js';

export interface SshConnectParams {
  host: string;
  port: number;
  username: string;
  /** Password, also used to answer keyboard-interactive prompts */
  credential: string;
}

export interface SshConnectOptions {
  readyTimeout?: number;
  term?: string;
  cols?: number;
  rows?: number;
  readChunkSize?: number;
  hostKeyPolicy?: HostKeyPolicy;
  knownHosts?: KnownHosts;
  logger?: Logger;
}

function errorLevel(err: Error): string | undefined {
  return 'level' in err && typeof err.level === 'string' ? err.level : undefined;
}

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/**
 * Maps an ssh2 client error onto the kinds a client is told about.
 */
export function classifyConnectError(err: Error, params: SshConnectParams, hostKeyRejected = false): ConnectError {
  const target = `${params.host}:${params.port}`;
  const level = errorLevel(err);

  if (hostKeyRejected) {
    return new ConnectError('protocol-error', `Host key verification failed for ${target}`, { cause: err });
  }
  if (level === 'client-authentication' || /authentication methods failed/i.test(err.message)) {
    return new ConnectError('auth-failed', `Authentication failed for ${params.username}@${target}`, { cause: err });
  }
  if (level === 'client-timeout' || errorCode(err) === 'ETIMEDOUT' || /timed out|ETIMEDOUT/i.test(err.message)) {
    return new ConnectError('timeout', `Timed out connecting to ${target}`, { cause: err });
  }
  if (level === 'protocol' || level === 'handshake') {
    return new ConnectError('protocol-error', `SSH protocol error from ${target}: ${err.message}`, { cause: err });
  }
  return new ConnectError('other', `Could not connect to ${target}: ${err.message}`, { cause: err });
}

/**
 * An interactive shell channel on a remote host. Channel data is queued as it
 * arrives; read() only takes from the queue when data is ready.
 */
export class SshTransport implements TransportHandle {
  readonly kind = 'ssh';

  private readonly output = new OutputQueue();
  private open = true;
  private teardown: Promise<void> | null = null;

  private constructor(
    private readonly client: Client,
    private readonly channel: ClientChannel,
    private readonly readChunkSize: number,
    private readonly log: Logger,
  ) {
    const enqueue = (data: Buffer) => {
      if (this.open) this.output.push(data);
    };

    channel.on('data', enqueue);
    channel.stderr.on('data', enqueue);

    channel.on('close', () => {
      this.log.debug('SSH channel closed');
      this.open = false;
    });

    channel.on('error', (err: Error) => {
      this.log.debug({ err }, 'SSH channel error');
    });

    client.on('close', () => {
      this.open = false;
    });
  }

  static connect(params: SshConnectParams, options: SshConnectOptions = {}): Promise<SshTransport> {
    const log = options.logger || rootLogger;
    const knownHosts = options.knownHosts || KnownHosts.inMemory(log);
    const policy = options.hostKeyPolicy || 'accept-any';
    const hostId = `${params.host}:${params.port}`;
    const client = new Client();

    return new Promise((resolve, reject) => {
      let settled = false;
      let hostKeyRejected = false;

      const fail = (err: ConnectError) => {
        if (settled) return;
        settled = true;
        log.warn({ host: hostId, kind: err.kind }, err.message);
        client.end();
        reject(err);
      };

      client.on('ready', () => {
        log.info({ host: hostId, username: params.username }, 'SSH authenticated, opening shell');

        client.shell(
          {
            term: options.term || 'xterm-256color',
            cols: options.cols || 80,
            rows: options.rows || 24,
          },
          (err, channel) => {
            if (err) {
              fail(new ConnectError('other', `Remote host refused an interactive shell: ${err.message}`, { cause: err }));
              return;
            }
            if (settled) {
              channel.close();
              return;
            }
            settled = true;
            resolve(new SshTransport(client, channel, options.readChunkSize || 4096, log));
          }
        );
      });

      client.on('keyboard-interactive', (_name, _instructions, _lang, prompts, finish) => {
        finish(prompts.map(() => params.credential));
      });

      client.on('error', (err) => {
        if (settled) {
          log.debug({ err, host: hostId }, 'SSH client error');
          return;
        }
        fail(classifyConnectError(err, params, hostKeyRejected));
      });

      client.on('close', () => {
        fail(new ConnectError('other', `Connection to ${hostId} closed before the shell was ready`));
      });

      const config: ConnectConfig = {
        host: params.host,
        port: params.port,
        username: params.username,
        password: params.credential,
        tryKeyboard: true,
        readyTimeout: options.readyTimeout || 20000,
        hostVerifier: (key: Buffer): boolean => {
          const decision = knownHosts.check(hostId, key, policy);
          if (!decision.accepted) {
            hostKeyRejected = true;
            log.warn({ host: hostId, status: decision.status, fingerprint: decision.fingerprint, policy }, 'Rejected host key');
          }
          return decision.accepted;
        },
      };

      try {
        client.connect(config);
      } catch (err) {
        fail(new ConnectError('other', `Could not connect to ${hostId}: ${errorMessage(err)}`, { cause: err }));
      }
    });
  }

  get isAlive(): boolean {
    return this.open;
  }

  /** Whether output is waiting to be read */
  get hasData(): boolean {
    return this.output.size > 0;
  }

  read(): Buffer {
    if (!this.hasData) return Buffer.alloc(0);
    return this.output.take(this.readChunkSize);
  }

  write(data: string): void {
    if (!this.open || data.length === 0) return;
    try {
      this.channel.write(data);
    } catch (err) {
      this.log.debug({ err }, 'SSH write dropped');
    }
  }

  resize(rows: number, cols: number): void {
    if (!this.open) return;
    try {
      this.channel.setWindow(rows, cols, 0, 0);
    } catch (err) {
      this.log.debug({ err }, 'SSH resize failed');
    }
  }

  terminate(): Promise<void> {
    if (!this.teardown) {
      this.teardown = this.shutdown();
    }
    return this.teardown;
  }

  private async shutdown(): Promise<void> {
    this.open = false;
    this.output.clear();
    try {
      this.channel.close();
    } catch (err) {
      this.log.debug({ err }, 'SSH channel close failed');
    }
    this.client.end();
  }
}
