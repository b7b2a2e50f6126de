import { describe, expect, it } from 'vitest';
import { parseConfig } from '../config/index.js';
import { localShellCommand, sshCommand } from './transports.js';

describe('localShellCommand', () => {
  it('uses the configured command', () => {
    const config = parseConfig({ pty: { command: '/usr/bin/zsh', args: ['-l'] } });

    expect(localShellCommand(config.pty, { SHELL: '/bin/bash' })).toEqual({ command: '/usr/bin/zsh', args: ['-l'] });
  });

  it('falls back to the login shell, then /bin/sh', () => {
    const config = parseConfig({});

    expect(localShellCommand(config.pty, { SHELL: '/bin/bash' })).toEqual({ command: '/bin/bash', args: [] });
    expect(localShellCommand(config.pty, {})).toEqual({ command: '/bin/sh', args: [] });
  });
});

describe('sshCommand', () => {
  it('disables host key checking for accept-any', () => {
    expect(sshCommand({ host: 'example.test', user: 'pi', port: 22 }, 'accept-any')).toEqual({
      command: 'ssh',
      args: ['-o', 'StrictHostKeyChecking=no', '-p', '22', 'pi@example.test'],
    });
  });

  it('maps the other policies onto ssh options', () => {
    expect(sshCommand({ host: 'h', port: 2222 }, 'accept-new').args).toEqual(['-o', 'StrictHostKeyChecking=accept-new', '-p', '2222', 'h']);
    expect(sshCommand({ host: 'h', user: 'u', port: 22 }, 'strict').args[1]).toBe('StrictHostKeyChecking=yes');
  });
});
