import * as pty from 'node-pty';
import { accessSync, constants, statSync } from 'fs';
import { delimiter, join } from 'path';
import type { TransportHandle } from '../types/Terminal.js';
import { SpawnError, errorMessage } from '../utils/errors.js';
import { OutputQueue } from '../utils/OutputQueue.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface PtySpawnOptions {
  cols?: number;
  rows?: number;
  term?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Largest slice returned by a single read */
  readChunkSize?: number;
  /** How long to wait for the child after SIGTERM before escalating */
  terminateTimeout?: number;
  /** How long to wait for the child after SIGKILL before giving up on it */
  killTimeout?: number;
  logger?: Logger;
}

const DEFAULTS = {
  cols: 80,
  rows: 24,
  term: 'xterm-256color',
  readChunkSize: 4096,
  terminateTimeout: 3000,
  killTimeout: 1000,
};

function isExecutableFile(path: string): boolean {
  try {
    accessSync(path, constants.X_OK);
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Finds the executable a command name refers to. Names containing a slash are
 * taken as paths; bare names are searched for on PATH.
 */
export function resolveExecutable(command: string, searchPath: string = process.env.PATH || ''): string | null {
  if (command.includes('/')) {
    return isExecutableFile(command) ? command : null;
  }

  for (const dir of searchPath.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, command);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

function definedEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * A child process attached to a local pseudo-terminal. Output from node-pty is
 * queued as it arrives and handed out by read() in bounded slices.
 */
export class PtyTransport implements TransportHandle {
  readonly kind = 'pty';

  private readonly output = new OutputQueue();
  private readonly exitWaiters = new Set<() => void>();
  private readonly subscriptions: pty.IDisposable[];
  private exited = false;
  private closed = false;
  private teardown: Promise<void> | null = null;
  private exitCode: number | null = null;

  private constructor(
    private readonly proc: pty.IPty,
    private readonly readChunkSize: number,
    private readonly terminateTimeout: number,
    private readonly killTimeout: number,
    private readonly log: Logger,
  ) {
    this.subscriptions = [
      proc.onData((data: string) => {
        if (!this.closed) {
          this.output.push(Buffer.from(data, 'utf8'));
        }
      }),
      proc.onExit(({ exitCode, signal }) => {
        this.exited = true;
        this.exitCode = exitCode;
        this.log.debug({ pid: proc.pid, exitCode, signal }, 'PTY child exited');
        for (const resolve of this.exitWaiters) resolve();
        this.exitWaiters.clear();
      }),
    ];
  }

  static spawn(command: string, args: string[], options: PtySpawnOptions = {}): PtyTransport {
    const log = options.logger || rootLogger;
    const env = options.env || process.env;

    const file = resolveExecutable(command, env.PATH || '');
    if (!file) {
      throw new SpawnError(command, `Command not found: ${command}`);
    }

    let proc: pty.IPty;
    try {
      proc = pty.spawn(file, args, {
        name: options.term || DEFAULTS.term,
        cols: options.cols || DEFAULTS.cols,
        rows: options.rows || DEFAULTS.rows,
        cwd: options.cwd || env.HOME || '/',
        env: definedEnv(env),
      });
    } catch (err) {
      throw new SpawnError(command, `Failed to start ${command}: ${errorMessage(err)}`, { cause: err });
    }

    log.info({ pid: proc.pid, command, args }, 'Spawned PTY process');

    return new PtyTransport(
      proc,
      options.readChunkSize || DEFAULTS.readChunkSize,
      options.terminateTimeout ?? DEFAULTS.terminateTimeout,
      options.killTimeout ?? DEFAULTS.killTimeout,
      log,
    );
  }

  get pid(): number {
    return this.proc.pid;
  }

  get isAlive(): boolean {
    return !this.closed && !this.exited;
  }

  /** Exit code of the child, once it has exited. */
  get code(): number | null {
    return this.exitCode;
  }

  read(): Buffer {
    if (this.closed) return Buffer.alloc(0);
    return this.output.take(this.readChunkSize);
  }

  write(data: string): void {
    if (!this.isAlive || data.length === 0) return;
    try {
      this.proc.write(data);
    } catch (err) {
      this.log.debug({ err }, 'PTY write dropped');
    }
  }

  resize(rows: number, cols: number): void {
    if (!this.isAlive) return;
    try {
      this.proc.resize(cols, rows);
    } catch (err) {
      this.log.debug({ err }, 'PTY resize failed');
    }
  }

  terminate(): Promise<void> {
    if (!this.teardown) {
      this.teardown = this.shutdown();
    }
    return this.teardown;
  }

  private async shutdown(): Promise<void> {
    if (!this.exited) {
      this.signal('SIGTERM');
      const exited = await this.waitForExit(this.terminateTimeout);

      if (!exited) {
        this.log.warn({ pid: this.proc.pid, timeout: this.terminateTimeout }, 'PTY child ignored SIGTERM, sending SIGKILL');
        this.signal('SIGKILL');
        if (!(await this.waitForExit(this.killTimeout))) {
          this.log.error({ pid: this.proc.pid }, 'PTY child did not exit after SIGKILL');
        }
      }
    }

    this.closed = true;
    this.output.clear();
    for (const subscription of this.subscriptions) {
      subscription.dispose();
    }
  }

  private signal(signal: string): void {
    try {
      this.proc.kill(signal);
    } catch (err) {
      this.log.debug({ err, signal }, 'PTY kill failed');
    }
  }

  private waitForExit(timeout: number): Promise<boolean> {
    if (this.exited) return Promise.resolve(true);

    return new Promise((resolve) => {
      const onExit = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.exitWaiters.delete(onExit);
        resolve(false);
      }, timeout);
      this.exitWaiters.add(onExit);
    });
  }
}
