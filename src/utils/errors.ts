/** The command could not be started in a pseudo-terminal. */
export class SpawnError extends Error {
  readonly command: string;

  constructor(command: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SpawnError';
    this.command = command;
  }
}

export type ConnectErrorKind = 'auth-failed' | 'protocol-error' | 'timeout' | 'other';

/** The remote shell could not be established. */
export class ConnectError extends Error {
  readonly kind: ConnectErrorKind;

  constructor(kind: ConnectErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectError';
    this.kind = kind;
  }
}

/** The browser side of a session has gone away. */
export class ChannelClosedError extends Error {
  constructor(message = 'Client connection closed', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChannelClosedError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Message safe to show a client. Spawn and connect errors carry messages
 * written for users; anything else is reduced to a generic line.
 */
export function describeError(err: unknown): string {
  if (err instanceof SpawnError || err instanceof ConnectError) {
    return err.message;
  }
  return 'Failed to start terminal session';
}
