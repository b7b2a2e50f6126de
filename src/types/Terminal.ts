/** Terminal bridge state */
export type BridgeState =
  | 'idle'
  | 'connecting'
  | 'active'
  | 'closed';

/** Which backend a bridge relays to */
export type TransportKind = 'pty' | 'ssh';

export interface TerminalDimensions {
  cols: number;
  rows: number;
}

/**
 * A live shell endpoint. Reads never block and never throw; writes and
 * resizes are best-effort and become no-ops once the handle is closed.
 */
export interface TransportHandle {
  readonly kind: TransportKind;
  /** True while the I/O handle is open and the shell behind it is running. */
  readonly isAlive: boolean;
  /** Returns the next buffered output in production order, or an empty buffer. */
  read(): Buffer;
  write(data: string): void;
  resize(rows: number, cols: number): void;
  /** Idempotent; every call resolves once teardown has finished. */
  terminate(): Promise<void>;
}

/** Builds the transport for a bridge. Synchronous factories skip the connecting state. */
export type TransportFactory = () => TransportHandle | Promise<TransportHandle>;

/** Why a bridge stopped */
export type StopReason =
  | 'client-disconnected'
  | 'transport-exited'
  | 'start-failed'
  | 'send-failed'
  | 'terminated'
  | 'shutdown';

/** Snapshot of a bridge for the management API */
export interface BridgeInfo {
  id: string;
  state: BridgeState;
  transport: TransportKind | null;
  dimensions: TerminalDimensions;
  bytesIn: number;
  bytesOut: number;
  createdAt: Date;
  lastActivityAt: Date;
  stopReason?: StopReason;
}
