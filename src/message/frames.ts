import { randomUUID } from 'node:crypto';
import { isRecord } from '../utils.js';

/**
 * A chat message. Immutable once created: forwarders relay it unchanged,
 * so every copy carries the id assigned by the originating node.
 */
export interface ChatMessage {
  /** Globally unique id (random UUID), assigned once at the origin */
  readonly id: string;
  /** Room the message belongs to */
  readonly channel: string;
  /** Display name of the originating user */
  readonly sender: string;
  /** Text payload */
  readonly body: string;
  /** Unix timestamp (ms) at the origin; informational only */
  readonly createdAt: number;
}

/**
 * First frame on every stream, sent by both sides.
 */
export interface HelloFrame {
  type: 'hello';
  nodeId: string;
  username: string;
  channel: string;
  chatPort: number;
}

export interface ChatFrame {
  type: 'chat';
  message: ChatMessage;
}

/**
 * Point-to-point text for a single connected user. Never gossiped.
 */
export interface DirectFrame {
  type: 'direct';
  channel: string;
  sender: string;
  to: string;
  body: string;
  createdAt: number;
}

/**
 * Application-defined signal for a single connected user, e.g. a typing
 * indicator. Never gossiped; `data` is an arbitrary JSON object.
 */
export interface ControlFrame {
  type: 'control';
  channel: string;
  sender: string;
  to: string;
  ctrl: string;
  data: Record<string, unknown>;
  createdAt: number;
}

export type Frame = HelloFrame | ChatFrame | DirectFrame | ControlFrame;

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

/**
 * Create a new message with a fresh id.
 */
export function createChatMessage(
  channel: string,
  sender: string,
  body: string,
  createdAt: number = Date.now(),
): ChatMessage {
  return { id: randomUUID(), channel, sender, body, createdAt };
}

export function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 && value <= 65535;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.length > 0;
}

/**
 * Serialize a frame to its wire form (one JSON object per WebSocket message).
 */
export function encodeFrame(frame: Frame): string {
  switch (frame.type) {
    case 'hello':
      return JSON.stringify({
        type: 'hello',
        node_id: frame.nodeId,
        username: frame.username,
        channel: frame.channel,
        chat_port: frame.chatPort,
      });
    case 'chat':
      return JSON.stringify({
        type: 'chat',
        id: frame.message.id,
        channel: frame.message.channel,
        sender: frame.message.sender,
        body: frame.message.body,
        created_at: frame.message.createdAt,
      });
    case 'direct':
      return JSON.stringify({
        type: 'direct',
        channel: frame.channel,
        sender: frame.sender,
        to: frame.to,
        body: frame.body,
        created_at: frame.createdAt,
      });
    case 'control':
      return JSON.stringify({
        type: 'control',
        channel: frame.channel,
        sender: frame.sender,
        to: frame.to,
        ctrl: frame.ctrl,
        data: frame.data,
        created_at: frame.createdAt,
      });
  }
}

/**
 * Parse and validate a wire frame. Unknown fields are ignored.
 */
export function decodeFrame(text: string): DecodeResult<Frame> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ok: false, reason: 'invalid_json' };
  }

  if (!isRecord(raw)) {
    return { ok: false, reason: 'not_an_object' };
  }

  switch (raw.type) {
    case 'hello': {
      const { node_id, username, channel, chat_port } = raw;
      if (!isNonEmptyString(node_id) || typeof username !== 'string' || typeof channel !== 'string') {
        return { ok: false, reason: 'invalid_hello' };
      }
      if (!isPort(chat_port)) {
        return { ok: false, reason: 'invalid_hello' };
      }
      return {
        ok: true,
        value: { type: 'hello', nodeId: node_id, username, channel, chatPort: chat_port },
      };
    }
    case 'chat': {
      const { id, channel, sender, body, created_at } = raw;
      if (!isNonEmptyString(id) || typeof channel !== 'string' || typeof sender !== 'string') {
        return { ok: false, reason: 'invalid_chat' };
      }
      if (typeof body !== 'string' || typeof created_at !== 'number') {
        return { ok: false, reason: 'invalid_chat' };
      }
      return {
        ok: true,
        value: { type: 'chat', message: { id, channel, sender, body, createdAt: created_at } },
      };
    }
    case 'direct': {
      const { channel, sender, to, body, created_at } = raw;
      if (typeof channel !== 'string' || typeof sender !== 'string' || typeof to !== 'string') {
        return { ok: false, reason: 'invalid_direct' };
      }
      if (typeof body !== 'string' || typeof created_at !== 'number') {
        return { ok: false, reason: 'invalid_direct' };
      }
      return {
        ok: true,
        value: { type: 'direct', channel, sender, to, body, createdAt: created_at },
      };
    }
    case 'control': {
      const { channel, sender, to, ctrl, data, created_at } = raw;
      if (typeof channel !== 'string' || typeof sender !== 'string' || typeof to !== 'string') {
        return { ok: false, reason: 'invalid_control' };
      }
      if (!isNonEmptyString(ctrl) || typeof created_at !== 'number') {
        return { ok: false, reason: 'invalid_control' };
      }
      if (data !== undefined && !isRecord(data)) {
        return { ok: false, reason: 'invalid_control' };
      }
      return {
        ok: true,
        value: { type: 'control', channel, sender, to, ctrl, data: data ?? {}, createdAt: created_at },
      };
    }
    default:
      return { ok: false, reason: 'unknown_type' };
  }
}
