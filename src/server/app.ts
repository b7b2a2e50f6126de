import Fastify, { FastifyError } from 'fastify';
import cors from '@fastify/cors';
import { createServer, Server } from 'http';
import { WebSocketServerManager } from './WebSocketServer.js';
import { sessionRoutes } from '../api/sessions.js';
import { getConfig, type AppConfig } from '../config/index.js';
import { KnownHosts } from '../services/KnownHosts.js';
import { SessionRegistry } from '../services/SessionRegistry.js';
import type { TerminalBridge } from '../services/TerminalBridge.js';
import { logger } from '../utils/logger.js';

export async function createApp(registry: SessionRegistry<TerminalBridge>, config: AppConfig = getConfig()) {
  const app = Fastify({ logger: { level: config.log.level } });

  // CORS configuration
  await app.register(cors, {
    origin: config.server.corsOrigins.length > 0 ? config.server.corsOrigins : false,
    methods: ['GET', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  // Root endpoint
  app.get('/', async () => ({
    name: 'web-shell-bridge',
    version: '1.0.0',
    endpoints: {
      health: '/health',
      sessions: '/api/sessions',
      websocket: config.websocket.path,
    },
  }));

  // Health check endpoint
  app.get('/health', async () => ({ status: 'ok', sessions: registry.size }));

  await sessionRoutes(app, registry);

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request failed');
    const statusCode = error.statusCode || 500;
    reply.status(statusCode).send({
      error: statusCode >= 500 ? 'Internal Server Error' : error.message,
      code: error.code || 'INTERNAL_ERROR',
    });
  });

  return app;
}

export interface RunningServer {
  httpServer: Server;
  registry: SessionRegistry<TerminalBridge>;
  close(): Promise<void>;
}

export async function startServer(config: AppConfig = getConfig()): Promise<RunningServer> {
  logger.level = config.log.level;
  const registry = new SessionRegistry<TerminalBridge>();
  const knownHosts = config.ssh.knownHostsPath
    ? await KnownHosts.open(config.ssh.knownHostsPath)
    : KnownHosts.inMemory();

  const app = await createApp(registry, config);
  await app.ready();
  const httpServer = createServer((req, res) => {
    app.routing(req, res);
  });

  // Initialize WebSocket server
  const webSocketServer = new WebSocketServerManager({ config, registry, knownHosts });
  webSocketServer.initialize(httpServer);

  const close = async () => {
    await registry.stopAll();
    await webSocketServer.close();
    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });
    await app.close();
    await knownHosts.flush();
  };

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(config.server.port, config.server.host, () => {
      httpServer.off('error', reject);
      const address = httpServer.address();
      const port = address && typeof address !== 'string' ? address.port : config.server.port;
      logger.info(`Server running on http://${config.server.host}:${port}`);
      logger.info(`Terminal WebSocket on ws://${config.server.host}:${port}${config.websocket.path}`);
      resolve();
    });
  });

  return { httpServer, registry, close };
}
