import { pino, type Logger } from 'pino';

export type { Logger };

export const logger: Logger = pino({
  name: 'web-shell-bridge',
  level: process.env.LOG_LEVEL || 'info',
  redact: ['credential', 'password', '*.credential', '*.password'],
});
