import type { BridgeInfo, StopReason } from '../types/Terminal.js';

/** The parts of a bridge the registry needs */
export interface RegisteredBridge {
  readonly id: string;
  info(): BridgeInfo;
  stop(reason?: StopReason): Promise<void>;
}

/**
 * Active bridges by session id. Bridges add and remove themselves; the
 * registry only answers lookups and forwards external stop requests.
 */
export class SessionRegistry<T extends RegisteredBridge = RegisteredBridge> {
  private bridges: Map<string, T> = new Map();

  register(id: string, bridge: T): void {
    const existing = this.bridges.get(id);
    if (existing && existing !== bridge) {
      throw new Error(`Session already registered: ${id}`);
    }
    this.bridges.set(id, bridge);
  }

  /** Removes the entry. When `bridge` is given, only if it is the one registered. */
  deregister(id: string, bridge?: T): boolean {
    if (bridge && this.bridges.get(id) !== bridge) return false;
    return this.bridges.delete(id);
  }

  lookup(id: string): T | undefined {
    return this.bridges.get(id);
  }

  list(): BridgeInfo[] {
    return Array.from(this.bridges.values()).map(b => b.info());
  }

  get size(): number {
    return this.bridges.size;
  }

  /** Stops one bridge from outside its session. Returns false if it is unknown. */
  async terminate(id: string): Promise<boolean> {
    const bridge = this.bridges.get(id);
    if (!bridge) return false;
    await bridge.stop('terminated');
    return true;
  }

  async stopAll(): Promise<void> {
    const bridges = Array.from(this.bridges.values());
    await Promise.all(bridges.map(b => b.stop('shutdown')));
  }
}
