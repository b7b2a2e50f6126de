import { describe, expect, it } from 'vitest';
import { deepMerge, loadEnvConfig, parseConfig } from './index.js';

describe('config', () => {
  it('fills every default from an empty object', () => {
    const config = parseConfig({});

    expect(config.defaultTransport).toBe('pty');
    expect(config.server).toEqual({ port: 8765, host: '0.0.0.0', corsOrigins: [] });
    expect(config.websocket).toEqual({ path: '/ws/terminal', heartbeatInterval: 30000 });
    expect(config.relay).toEqual({ pollInterval: 10, readChunkSize: 4096 });
    expect(config.pty.terminateTimeout).toBe(3000);
    expect(config.pty.killTimeout).toBe(1000);
    expect(config.ssh.hostKeyPolicy).toBe('accept-any');
    expect(config.log.level).toBe('info');
  });

  it('reads overrides from the environment', () => {
    const env = loadEnvConfig({
      PORT: '9000',
      HOST: '127.0.0.1',
      SSH_HOST_KEY_POLICY: 'strict',
      RELAY_POLL_INTERVAL: '20',
      DEFAULT_TRANSPORT: 'ssh',
    });

    expect(env).toEqual({
      server: { port: 9000, host: '127.0.0.1' },
      ssh: { hostKeyPolicy: 'strict' },
      relay: { pollInterval: 20 },
      defaultTransport: 'ssh',
    });
  });

  it('lets later sources win key by key', () => {
    const merged = deepMerge(
      { server: { port: 1000, host: 'file-host' }, pty: { args: ['-l'] } },
      { server: { port: 2000 } }
    );

    expect(merged).toEqual({ server: { port: 2000, host: 'file-host' }, pty: { args: ['-l'] } });
  });

  it('replaces arrays rather than merging them', () => {
    expect(deepMerge({ pty: { args: ['-l'] } }, { pty: { args: ['-i'] } })).toEqual({ pty: { args: ['-i'] } });
  });

  it('rejects an invalid port', () => {
    expect(() => parseConfig({ server: { port: 70000 } })).toThrow('Invalid configuration: server.port: Invalid port number');
  });

  it('rejects an unknown host key policy', () => {
    expect(() => parseConfig({ ssh: { hostKeyPolicy: 'trust-me' } })).toThrow(/ssh\.hostKeyPolicy/);
  });

  it('rejects a poll interval of zero', () => {
    expect(() => parseConfig({ relay: { pollInterval: 0 } })).toThrow(/relay\.pollInterval/);
  });
});
