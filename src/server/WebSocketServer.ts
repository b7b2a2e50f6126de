import { WebSocket, WebSocketServer as WSServer } from 'ws';
import { IncomingMessage, Server } from 'http';
import { z } from 'zod';
import type { AppConfig } from '../config/index.js';
import type { KnownHosts } from '../services/KnownHosts.js';
import type { SessionRegistry } from '../services/SessionRegistry.js';
import { TerminalBridge } from '../services/TerminalBridge.js';
import { createPtyFactory, createSshConnector } from '../services/transports.js';
import type { TransportKind } from '../types/Terminal.js';
import { logger } from '../utils/logger.js';
import { WebSocketChannel } from './WebSocketChannel.js';

interface ExtendedWebSocket extends WebSocket {
  isAlive?: boolean;
}

const SHUTDOWN_GRACE_PERIOD = 2000;

// Leading dashes would be read by ssh as options.
const hostPattern = /^[A-Za-z0-9_.:[\]][A-Za-z0-9_.:[\]-]*$/;
const userPattern = /^[A-Za-z0-9_.][A-Za-z0-9_.-]*$/;

export const connectionQuerySchema = z.object({
  transport: z.enum(['pty', 'ssh']).optional(),
  host: z.string().regex(hostPattern, 'Invalid host').optional(),
  user: z.string().regex(userPattern, 'Invalid user').optional(),
  port: z.coerce.number().int().min(1).max(65535).optional(),
});

export type ConnectionQuery = z.infer<typeof connectionQuerySchema>;

export function parseConnectionQuery(url: string | undefined): ConnectionQuery | null {
  const params = new URL(url || '/', 'http://localhost').searchParams;
  const result = connectionQuerySchema.safeParse(Object.fromEntries(params));
  return result.success ? result.data : null;
}

export interface WebSocketServerDeps {
  config: AppConfig;
  registry: SessionRegistry<TerminalBridge>;
  knownHosts: KnownHosts;
}

export class WebSocketServerManager {
  private wss: WSServer | null = null;
  private pingInterval: NodeJS.Timeout | null = null;

  constructor(private readonly deps: WebSocketServerDeps) {}

  initialize(server: Server): void {
    const { config } = this.deps;
    this.wss = new WSServer({ server, path: config.websocket.path });

    this.wss.on('connection', (ws: ExtendedWebSocket, req: IncomingMessage) => {
      ws.isAlive = true;
      ws.on('pong', () => {
        ws.isAlive = true;
      });

      this.handleConnection(ws, req).catch((err: unknown) => {
        logger.error({ err }, 'Terminal session failed');
        ws.terminate();
      });
    });

    // Heartbeat to detect dead connections
    this.pingInterval = setInterval(() => {
      this.wss?.clients.forEach((client) => {
        const extWs: ExtendedWebSocket = client;
        if (extWs.isAlive === false) {
          extWs.terminate();
          return;
        }
        extWs.isAlive = false;
        extWs.ping();
      });
    }, config.websocket.heartbeatInterval);

    this.wss.on('close', () => {
      if (this.pingInterval) {
        clearInterval(this.pingInterval);
        this.pingInterval = null;
      }
    });
  }

  private async handleConnection(ws: WebSocket, req: IncomingMessage): Promise<void> {
    const { config, registry, knownHosts } = this.deps;
    const channel = new WebSocketChannel(ws);

    const query = parseConnectionQuery(req.url);
    if (!query) {
      logger.warn({ url: req.url }, 'Rejected connection with invalid parameters');
      try {
        await channel.send(JSON.stringify({ type: 'error', message: 'Invalid connection parameters' }));
      } catch (err) {
        logger.debug({ err }, 'Client left before the error was sent');
      }
      channel.close(1008, 'invalid-parameters');
      return;
    }

    const transport: TransportKind = query.transport || config.defaultTransport;
    const bridge = new TerminalBridge({
      channel,
      registry,
      pollInterval: config.relay.pollInterval,
      connector: transport === 'ssh' ? createSshConnector(config, knownHosts, logger) : undefined,
      logger,
    });

    logger.info({ sessionId: bridge.id, transport, remote: req.socket.remoteAddress }, 'Client connected');

    if (transport === 'pty') {
      const target = query.host
        ? { host: query.host, user: query.user, port: query.port || config.ssh.defaultPort }
        : undefined;
      await bridge.start(createPtyFactory(config, logger.child({ sessionId: bridge.id }), target));
    }

    await bridge.run();
  }

  /**
   * Stops accepting connections and closes every client still attached,
   * including ones whose bridge never started. Clients that do not finish
   * the close handshake within the grace period are terminated.
   */
  async close(): Promise<void> {
    if (this.pingInterval) {
      clearInterval(this.pingInterval);
      this.pingInterval = null;
    }

    const wss = this.wss;
    if (!wss) return;

    const closed = new Promise<void>((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });

    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.close(1001, 'shutdown');
      }
    }

    const forceTimer = setTimeout(() => {
      logger.warn({ clients: wss.clients.size }, 'Terminating clients that did not close in time');
      for (const client of wss.clients) {
        client.terminate();
      }
    }, SHUTDOWN_GRACE_PERIOD);

    try {
      await closed;
    } finally {
      clearTimeout(forceTimer);
    }
  }

  getConnectionCount(): number {
    return this.wss?.clients.size ?? 0;
  }
}
