import { parseArgs } from 'node:util';
import { parseLogLevel } from './logger.js';
import type { ChatConfigInput } from './config.js';
import type { ChatNode } from './node.js';
import { formatDisplayName, parseHostPort } from './utils.js';

export interface CliArgs {
  config?: string;
  help: boolean;
  overrides: ChatConfigInput;
}

export const USAGE = [
  'Usage: lanchat --username <name> --channel <room> [options]',
  'Options:',
  '  --host <addr>          chat listener address (default 0.0.0.0)',
  '  --port <n>             chat listener port, 0 = any free port (default 0)',
  '  --peer <host:port>     dial this peer directly (repeatable)',
  '  --no-discovery         disable UDP beacon discovery',
  '  --discovery-port <n>   UDP discovery port (default 54545)',
  '  --log-level <level>    debug | info | warn | error | silent',
  '  --config <path>        config file (default $LANCHAT_CONFIG or ~/.config/lanchat/config.json)',
  'Commands while running: /peers, /status, /dm <user> <text>, /quit',
].join('\n');

function parsePortOption(name: string, value: string, allowZero: boolean): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < (allowZero ? 0 : 1) || port > 65535) {
    throw new Error(`--${name} must be an integer between ${allowZero ? 0 : 1} and 65535`);
  }
  return port;
}

/**
 * Parse command-line arguments into config overrides.
 *
 * @throws Error on malformed values
 */
export function parseCliArgs(args: string[]): CliArgs {
  const parsed = parseArgs({
    args,
    options: {
      username: { type: 'string' },
      channel: { type: 'string' },
      host: { type: 'string' },
      port: { type: 'string' },
      peer: { type: 'string', multiple: true },
      'no-discovery': { type: 'boolean' },
      'discovery-port': { type: 'string' },
      'log-level': { type: 'string' },
      config: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  });

  const values = parsed.values;
  const overrides: ChatConfigInput = {};

  if (values.username !== undefined) {
    overrides.username = values.username;
  }
  if (values.channel !== undefined) {
    overrides.channel = values.channel;
  }
  if (values.host !== undefined) {
    overrides.host = values.host;
  }
  if (values.port !== undefined) {
    overrides.port = parsePortOption('port', values.port, true);
  }
  if (values.peer !== undefined) {
    overrides.peers = values.peer.map(parseHostPort);
  }
  if (values['no-discovery'] || values['discovery-port'] !== undefined) {
    overrides.discovery = {};
    if (values['no-discovery']) {
      overrides.discovery.enabled = false;
    }
    if (values['discovery-port'] !== undefined) {
      overrides.discovery.port = parsePortOption('discovery-port', values['discovery-port'], false);
    }
  }
  if (values['log-level'] !== undefined) {
    overrides.logLevel = parseLogLevel(values['log-level']);
  }

  return {
    config: values.config,
    help: values.help ?? false,
    overrides,
  };
}

/**
 * What the CLI should do after one line of input.
 */
export type CommandResult =
  | { action: 'continue'; output: string[] }
  | { action: 'quit'; output: string[] };

/**
 * Format a delivered message for the terminal.
 */
export function formatMessage(channel: string, sender: string, body: string): string {
  return `[${channel}] ${sender}: ${body}`;
}

/**
 * Handle one line typed by the user: a slash command, or chat text to send.
 */
export function runInputLine(node: ChatNode, line: string): CommandResult {
  const text = line.trim();
  if (text === '') {
    return { action: 'continue', output: [] };
  }

  if (!text.startsWith('/')) {
    node.send(text);
    return { action: 'continue', output: [] };
  }

  const [command] = text.split(/\s+/);
  switch (command) {
    case '/quit':
    case '/exit':
      return { action: 'quit', output: [] };

    case '/peers': {
      const peers = node.listPeers();
      if (peers.length === 0) {
        return { action: 'continue', output: ['No peers known yet.'] };
      }
      return {
        action: 'continue',
        output: peers.map((peer) => {
          const state = peer.connection?.isOpen() ? 'connected' : 'discovered';
          return `  - ${formatDisplayName(peer.username, peer.nodeId)} ${peer.address}:${peer.chatPort} ${state}`;
        }),
      };
    }

    case '/status': {
      const status = node.status();
      return {
        action: 'continue',
        output: [
          `node: ${status.nodeId}`,
          `channel: ${status.channel}`,
          `listening: ${status.host}:${status.port}`,
          `peers: ${status.peers} (${status.connections} streams)`,
          `seen: ${status.seen}`,
        ],
      };
    }

    case '/dm': {
      const match = /^\/dm\s+(\S+)\s+(.+)$/.exec(text);
      if (!match) {
        return { action: 'continue', output: ['Usage: /dm <user> <text>'] };
      }
      const [, to, body] = match;
      if (!node.sendDirect(to, body)) {
        return { action: 'continue', output: [`No connected peer named '${to}'.`] };
      }
      return { action: 'continue', output: [`(dm to ${to}) ${body}`] };
    }

    default:
      return { action: 'continue', output: [`Unknown command '${command}'. Use /peers, /status, /dm, /quit`] };
  }
}
