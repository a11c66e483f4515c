import { isRecord } from '../utils.js';
import { isPort, type DecodeResult } from './frames.js';

/**
 * Payload of a discovery datagram: who we are and where to dial us.
 */
export interface BeaconPayload {
  nodeId: string;
  channel: string;
  chatPort: number;
  username: string;
}

export function encodeBeacon(beacon: BeaconPayload): Buffer {
  return Buffer.from(
    JSON.stringify({
      type: 'discover',
      node_id: beacon.nodeId,
      channel: beacon.channel,
      chat_port: beacon.chatPort,
      username: beacon.username,
    }),
    'utf-8',
  );
}

/**
 * Parse a discovery datagram. Other traffic on the port is expected, so
 * anything that is not a well-formed beacon is reported, not thrown.
 */
export function decodeBeacon(data: Buffer): DecodeResult<BeaconPayload> {
  let raw: unknown;
  try {
    raw = JSON.parse(data.toString('utf-8'));
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }

  if (!isRecord(raw) || raw.type !== 'discover') {
    return { ok: false, reason: 'not_a_beacon' };
  }

  const { node_id, channel, chat_port, username } = raw;
  if (typeof node_id !== 'string' || node_id.length === 0 || typeof channel !== 'string') {
    return { ok: false, reason: 'invalid_beacon' };
  }
  if (!isPort(chat_port)) {
    return { ok: false, reason: 'invalid_beacon' };
  }

  return {
    ok: true,
    value: {
      nodeId: node_id,
      channel,
      chatPort: chat_port,
      username: typeof username === 'string' ? username : '',
    },
  };
}
