import { startServer } from './server/app.js';
import { loadConfig } from './config/index.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.log.level;
  logger.info({
    port: config.server.port,
    websocket: config.websocket.path,
    defaultTransport: config.defaultTransport,
    hostKeyPolicy: config.ssh.hostKeyPolicy,
  }, 'Starting with config');

  const server = await startServer(config);

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
