import * as fs from 'fs/promises';
import * as path from 'path';
import { createHash } from 'crypto';
import { z } from 'zod';
import { logger, type Logger } from '../utils/logger.js';

/**
 * How unknown or changed host keys are treated.
 * - accept-any: accept every key and remember it (no host checking)
 * - accept-new: remember keys of new hosts, reject keys that changed
 * - strict: accept only keys that are already known
 */
export type HostKeyPolicy = 'accept-any' | 'accept-new' | 'strict';

export type HostKeyStatus = 'known' | 'new' | 'changed';

export interface HostKeyDecision {
  accepted: boolean;
  status: HostKeyStatus;
  fingerprint: string;
}

const knownHostsFileSchema = z.object({
  version: z.literal(1),
  hosts: z.record(z.string(), z.string()),
});

type KnownHostsFile = z.infer<typeof knownHostsFileSchema>;

export function fingerprint(key: Buffer): string {
  return `SHA256:${createHash('sha256').update(key).digest('base64').replace(/=+$/, '')}`;
}

/**
 * Host key fingerprints by `host:port`. Lookups are synchronous so they can
 * run inside the SSH handshake; writes to the backing file happen behind.
 */
export class KnownHosts {
  private readonly entries: Map<string, string>;
  private saving: Promise<void> = Promise.resolve();

  private constructor(
    entries: Record<string, string>,
    private readonly storagePath: string | null,
    private readonly log: Logger,
  ) {
    this.entries = new Map(Object.entries(entries));
  }

  static inMemory(log: Logger = logger): KnownHosts {
    return new KnownHosts({}, null, log);
  }

  static async open(storagePath: string, log: Logger = logger): Promise<KnownHosts> {
    let hosts: Record<string, string> = {};
    try {
      const content = await fs.readFile(storagePath, 'utf-8');
      hosts = knownHostsFileSchema.parse(JSON.parse(content)).hosts;
      log.info({ path: storagePath, count: Object.keys(hosts).length }, 'Loaded known hosts');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        log.debug({ path: storagePath }, 'No known hosts file yet');
      } else {
        log.warn({ err, path: storagePath }, 'Ignoring unreadable known hosts file');
      }
    }
    return new KnownHosts(hosts, storagePath, log);
  }

  get(hostId: string): string | undefined {
    return this.entries.get(hostId);
  }

  get size(): number {
    return this.entries.size;
  }

  check(hostId: string, key: Buffer, policy: HostKeyPolicy): HostKeyDecision {
    const current = fingerprint(key);
    const known = this.entries.get(hostId);

    if (known === current) {
      return { accepted: true, status: 'known', fingerprint: current };
    }

    const status: HostKeyStatus = known === undefined ? 'new' : 'changed';
    const accepted =
      policy === 'accept-any' ||
      (policy === 'accept-new' && status === 'new');

    if (accepted) {
      if (status === 'changed') {
        this.log.warn({ hostId, previous: known, fingerprint: current }, 'Host key changed, accepting');
      }
      this.remember(hostId, current);
    }

    return { accepted, status, fingerprint: current };
  }

  /** Resolves once every pending write has reached disk. */
  flush(): Promise<void> {
    return this.saving;
  }

  private remember(hostId: string, value: string): void {
    this.entries.set(hostId, value);
    const storagePath = this.storagePath;
    if (!storagePath) return;

    const data: KnownHostsFile = { version: 1, hosts: Object.fromEntries(this.entries) };
    this.saving = this.saving
      .then(() => this.writeFile(storagePath, data))
      .catch((err: unknown) => {
        this.log.warn({ err, path: storagePath }, 'Failed to save known hosts');
      });
  }

  private async writeFile(storagePath: string, data: KnownHostsFile): Promise<void> {
    await fs.mkdir(path.dirname(storagePath), { recursive: true });
    const tempPath = `${storagePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
    await fs.rename(tempPath, storagePath);
  }
}
