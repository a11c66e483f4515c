import { readFileSync, existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { homedir } from 'node:os';
import { parseLogLevel, type LogLevel } from './logger.js';
import { DEFAULT_HOST, type DiscoveryOptions } from './node.js';
import { isRecord, parseHostPort, type HostPort } from './utils.js';

/**
 * Canonical lanchat configuration shape.
 */
export interface ChatConfig {
  username: string;
  channel: string;
  host: string;
  /** 0 picks any free port */
  port: number;
  /** Peers dialed without waiting for discovery */
  peers: HostPort[];
  discovery: DiscoveryOptions;
  logLevel: LogLevel;
}

/**
 * Values as they appear in the config file or on the command line;
 * everything optional until resolved.
 */
export interface ChatConfigInput {
  username?: string;
  channel?: string;
  host?: string;
  port?: number;
  peers?: HostPort[];
  discovery?: DiscoveryOptions;
  logLevel?: LogLevel;
}

/**
 * Default config file path: LANCHAT_CONFIG env or ~/.config/lanchat/config.json
 */
export function getDefaultConfigPath(): string {
  if (process.env.LANCHAT_CONFIG) {
    return resolve(process.env.LANCHAT_CONFIG);
  }
  return resolve(homedir(), '.config', 'lanchat', 'config.json');
}

function isPortNumber(value: unknown, allowZero: boolean): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= (allowZero ? 0 : 1) && value <= 65535;
}

/**
 * Parse and validate a config object (shared by sync and async loaders).
 *
 * @throws Error naming the first invalid field
 */
export function parseConfig(config: Record<string, unknown>): ChatConfigInput {
  const result: ChatConfigInput = {};

  if (config.username !== undefined) {
    if (typeof config.username !== 'string' || config.username.trim() === '') {
      throw new Error('Invalid config: username must be a non-empty string');
    }
    result.username = config.username;
  }

  if (config.channel !== undefined) {
    if (typeof config.channel !== 'string' || config.channel.trim() === '') {
      throw new Error('Invalid config: channel must be a non-empty string');
    }
    result.channel = config.channel;
  }

  if (config.host !== undefined) {
    if (typeof config.host !== 'string' || config.host === '') {
      throw new Error('Invalid config: host must be a non-empty string');
    }
    result.host = config.host;
  }

  if (config.port !== undefined) {
    if (!isPortNumber(config.port, true)) {
      throw new Error('Invalid config: port must be an integer between 0 and 65535');
    }
    result.port = config.port;
  }

  if (config.peers !== undefined) {
    if (!Array.isArray(config.peers)) {
      throw new Error('Invalid config: peers must be an array of "host:port" strings');
    }
    result.peers = config.peers.map((entry) => {
      if (typeof entry !== 'string') {
        throw new Error('Invalid config: peers must be an array of "host:port" strings');
      }
      return parseHostPort(entry);
    });
  }

  const rawDiscovery = config.discovery;
  if (rawDiscovery !== undefined) {
    if (!isRecord(rawDiscovery)) {
      throw new Error('Invalid config: discovery must be an object');
    }
    const d = rawDiscovery;
    const discovery: DiscoveryOptions = {};
    if (d.enabled !== undefined) {
      if (typeof d.enabled !== 'boolean') {
        throw new Error('Invalid config: discovery.enabled must be a boolean');
      }
      discovery.enabled = d.enabled;
    }
    if (d.port !== undefined) {
      if (!isPortNumber(d.port, false)) {
        throw new Error('Invalid config: discovery.port must be an integer between 1 and 65535');
      }
      discovery.port = d.port;
    }
    if (d.intervalMs !== undefined) {
      if (typeof d.intervalMs !== 'number' || !Number.isFinite(d.intervalMs) || d.intervalMs <= 0) {
        throw new Error('Invalid config: discovery.intervalMs must be a positive number');
      }
      discovery.intervalMs = d.intervalMs;
    }
    if (d.broadcastAddress !== undefined) {
      if (typeof d.broadcastAddress !== 'string' || d.broadcastAddress === '') {
        throw new Error('Invalid config: discovery.broadcastAddress must be a non-empty string');
      }
      discovery.broadcastAddress = d.broadcastAddress;
    }
    result.discovery = discovery;
  }

  if (config.logLevel !== undefined) {
    if (typeof config.logLevel !== 'string') {
      throw new Error('Invalid config: logLevel must be a string');
    }
    result.logLevel = parseLogLevel(config.logLevel);
  }

  return result;
}

function parseJson(content: string, configPath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new Error(`Invalid JSON in config file: ${configPath}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Config file must contain a JSON object: ${configPath}`);
  }
  return parsed;
}

/**
 * Load configuration from a JSON file (sync).
 * A missing file at the default path yields an empty config; a missing
 * file at an explicit path is an error.
 *
 * @throws Error if an explicit file doesn't exist or the config is invalid
 */
export function loadChatConfig(path?: string): ChatConfigInput {
  const configPath = path ?? getDefaultConfigPath();

  if (!existsSync(configPath)) {
    if (path) {
      throw new Error(`Config file not found at ${configPath}`);
    }
    return {};
  }

  return parseConfig(parseJson(readFileSync(configPath, 'utf-8'), configPath));
}

/**
 * Load configuration from a JSON file (async).
 */
export async function loadChatConfigAsync(path?: string): Promise<ChatConfigInput> {
  const configPath = path ?? getDefaultConfigPath();

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    const code = err && typeof err === 'object' && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      if (path) {
        throw new Error(`Config file not found at ${configPath}`);
      }
      return {};
    }
    throw err;
  }

  return parseConfig(parseJson(content, configPath));
}

/**
 * Merge command-line overrides over file values and apply defaults.
 *
 * @throws Error if username or channel is still missing
 */
export function resolveChatConfig(file: ChatConfigInput, overrides: ChatConfigInput = {}): ChatConfig {
  const username = overrides.username ?? file.username;
  const channel = overrides.channel ?? file.channel;
  if (!username) {
    throw new Error('Missing username: pass --username or set "username" in the config file');
  }
  if (!channel) {
    throw new Error('Missing channel: pass --channel or set "channel" in the config file');
  }

  return {
    username,
    channel,
    host: overrides.host ?? file.host ?? DEFAULT_HOST,
    port: overrides.port ?? file.port ?? 0,
    peers: [...(file.peers ?? []), ...(overrides.peers ?? [])],
    discovery: { ...file.discovery, ...overrides.discovery },
    logLevel: overrides.logLevel ?? file.logLevel ?? parseLogLevel(process.env.LANCHAT_LOG_LEVEL),
  };
}
