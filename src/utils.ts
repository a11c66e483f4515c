import { randomBytes } from 'node:crypto';

/**
 * A dialable host:port pair
 */
export interface HostPort {
  address: string;
  port: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Make a node id for this process: username plus 8 random hex characters.
 * Stable for the life of the node, new on every restart.
 */
export function createNodeId(username: string): string {
  return `${username}-${randomBytes(4).toString('hex')}`;
}

/**
 * Short display form of a node id: its random suffix.
 */
export function shortNodeId(nodeId: string): string {
  return nodeId.slice(-8);
}

/**
 * Formats a display name with the short node id postfix, e.g. "alice (3f8c2247)".
 */
export function formatDisplayName(username: string | undefined, nodeId: string): string {
  const shortId = shortNodeId(nodeId);
  if (!username || username.trim() === '') {
    return shortId;
  }
  return `${username} (${shortId})`;
}

/**
 * Parse "host:port" (or "[v6]:port").
 *
 * @throws Error if the string has no host or a port outside 1-65535
 */
export function parseHostPort(value: string): HostPort {
  const trimmed = value.trim();
  const match = /^\[([^\]]+)\]:(\d+)$/.exec(trimmed) ?? /^([^:\s]+):(\d+)$/.exec(trimmed);
  if (!match) {
    throw new Error(`Invalid peer address '${value}': expected host:port`);
  }

  const port = Number(match[2]);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid peer address '${value}': port must be 1-65535`);
  }

  return { address: match[1], port };
}
