import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

const serverSchema = z.object({
  /** 0 lets the OS pick a free port */
  port: z.number().int().min(0, 'Invalid port number').max(65535, 'Invalid port number').default(8765),
  host: z.string().default('0.0.0.0'),
  corsOrigins: z.array(z.string()).default([]),
});

const websocketSchema = z.object({
  path: z.string().startsWith('/').default('/ws/terminal'),
  heartbeatInterval: z.number().int().positive().default(30000),
});

const relaySchema = z.object({
  pollInterval: z.number().int().min(1).max(1000).default(10),
  readChunkSize: z.number().int().min(256).default(4096),
});

const ptySchema = z.object({
  /** Empty means the user's login shell */
  command: z.string().default(''),
  args: z.array(z.string()).default([]),
  cwd: z.string().optional(),
  term: z.string().default('xterm-256color'),
  terminateTimeout: z.number().int().min(0).default(3000),
  killTimeout: z.number().int().min(0).default(1000),
});

const sshSchema = z.object({
  defaultPort: z.number().int().min(1).max(65535).default(22),
  readyTimeout: z.number().int().positive().default(20000),
  hostKeyPolicy: z.enum(['accept-any', 'accept-new', 'strict']).default('accept-any'),
  /** Where accepted host keys are remembered; empty keeps them in memory only */
  knownHostsPath: z.string().default(''),
  term: z.string().default('xterm-256color'),
});

const logSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export const appConfigSchema = z.object({
  defaultTransport: z.enum(['pty', 'ssh']).default('pty'),
  server: serverSchema.default({}),
  websocket: websocketSchema.default({}),
  relay: relaySchema.default({}),
  pty: ptySchema.default({}),
  ssh: sshSchema.default({}),
  log: logSchema.default({}),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type PtyConfig = AppConfig['pty'];
export type SshConfig = AppConfig['ssh'];

type ConfigTree = { [key: string]: unknown };

const CONFIG_PATHS = [
  join(process.cwd(), 'config', 'config.json'),
  join(homedir(), '.config', 'web-shell-bridge', 'config.json'),
];

function isTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadConfigFile(paths: string[]): ConfigTree {
  for (const configPath of paths) {
    if (existsSync(configPath)) {
      try {
        const content: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
        if (isTree(content)) {
          logger.info({ path: configPath }, 'Loaded config file');
          return content;
        }
        logger.error({ path: configPath }, 'Config file must contain a JSON object');
      } catch (err) {
        logger.error({ err, path: configPath }, 'Failed to load config file');
      }
    }
  }
  return {};
}

function toInt(value: string): number {
  return parseInt(value, 10);
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): ConfigTree {
  const config: ConfigTree = {};

  const set = (section: string, key: string, value: unknown) => {
    const existing = config[section];
    const tree: ConfigTree = isTree(existing) ? existing : {};
    tree[key] = value;
    config[section] = tree;
  };

  if (env.PORT) set('server', 'port', toInt(env.PORT));
  if (env.HOST) set('server', 'host', env.HOST);
  if (env.WS_PATH) set('websocket', 'path', env.WS_PATH);
  if (env.LOG_LEVEL) set('log', 'level', env.LOG_LEVEL);
  if (env.RELAY_POLL_INTERVAL) set('relay', 'pollInterval', toInt(env.RELAY_POLL_INTERVAL));
  if (env.PTY_COMMAND) set('pty', 'command', env.PTY_COMMAND);
  if (env.PTY_TERMINATE_TIMEOUT) set('pty', 'terminateTimeout', toInt(env.PTY_TERMINATE_TIMEOUT));
  if (env.SSH_READY_TIMEOUT) set('ssh', 'readyTimeout', toInt(env.SSH_READY_TIMEOUT));
  if (env.SSH_HOST_KEY_POLICY) set('ssh', 'hostKeyPolicy', env.SSH_HOST_KEY_POLICY);
  if (env.SSH_KNOWN_HOSTS) set('ssh', 'knownHostsPath', env.SSH_KNOWN_HOSTS);
  if (env.DEFAULT_TRANSPORT) config.defaultTransport = env.DEFAULT_TRANSPORT;

  return config;
}

export function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isTree(value) && isTree(current) ? deepMerge(current, value) : value;
  }

  return result;
}

/** Validates merged settings, filling defaults. Throws with every problem listed. */
export function parseConfig(raw: ConfigTree): AppConfig {
  const result = appConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
  return result.data;
}

let cachedConfig: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cachedConfig) return cachedConfig;

  // Priority: env > file > defaults
  const config = parseConfig(deepMerge(loadConfigFile(CONFIG_PATHS), loadEnvConfig()));

  cachedConfig = config;
  return config;
}

export function getConfig(): AppConfig {
  return cachedConfig || loadConfig();
}

export function reloadConfig(): AppConfig {
  cachedConfig = null;
  return loadConfig();
}
