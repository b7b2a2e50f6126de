import type { AppConfig } from '../config/index.js';
import type { TransportFactory } from '../types/Terminal.js';
import type { Logger } from '../utils/logger.js';
import type { HostKeyPolicy, KnownHosts } from './KnownHosts.js';
import { PtyTransport } from './PtyTransport.js';
import { SshTransport } from './SshTransport.js';
import type { RemoteConnector } from './TerminalBridge.js';

/** Remote login run inside a local PTY with the system ssh client */
export interface SshCommandTarget {
  host: string;
  /** Omitted to let ssh pick the local user name */
  user?: string;
  port: number;
}

export interface ShellCommand {
  command: string;
  args: string[];
}

const STRICT_HOST_KEY_CHECKING: Record<HostKeyPolicy, string> = {
  'accept-any': 'no',
  'accept-new': 'accept-new',
  strict: 'yes',
};

export function localShellCommand(config: AppConfig['pty'], env: NodeJS.ProcessEnv = process.env): ShellCommand {
  if (config.command) {
    return { command: config.command, args: config.args };
  }
  return { command: env.SHELL || '/bin/sh', args: config.args };
}

export function sshCommand(target: SshCommandTarget, policy: HostKeyPolicy): ShellCommand {
  return {
    command: 'ssh',
    args: [
      '-o', `StrictHostKeyChecking=${STRICT_HOST_KEY_CHECKING[policy]}`,
      '-p', String(target.port),
      target.user ? `${target.user}@${target.host}` : target.host,
    ],
  };
}

/**
 * Factory for a PTY bridge: the configured local shell, or the ssh client
 * when the connection named a remote target.
 */
export function createPtyFactory(
  config: AppConfig,
  log: Logger,
  target?: SshCommandTarget,
): TransportFactory {
  const { command, args } = target
    ? sshCommand(target, config.ssh.hostKeyPolicy)
    : localShellCommand(config.pty);

  return () =>
    PtyTransport.spawn(command, args, {
      term: config.pty.term,
      cwd: config.pty.cwd,
      readChunkSize: config.relay.readChunkSize,
      terminateTimeout: config.pty.terminateTimeout,
      killTimeout: config.pty.killTimeout,
      logger: log,
    });
}

export function createSshConnector(config: AppConfig, knownHosts: KnownHosts, log: Logger): RemoteConnector {
  return params =>
    SshTransport.connect(params, {
      readyTimeout: config.ssh.readyTimeout,
      term: config.ssh.term,
      readChunkSize: config.relay.readChunkSize,
      hostKeyPolicy: config.ssh.hostKeyPolicy,
      knownHosts,
      logger: log,
    });
}
