import type { Logger } from '../logger.js';
import { createChatMessage, type ChatMessage, type Frame } from '../message/frames.js';
import { DedupCache } from './dedup-cache.js';

/**
 * Where the router sends frames. Implemented by PeerManager.
 */
export interface GossipTransport {
  /**
   * Send to every live stream except those to `excludeNodeId`.
   * @returns Number of streams written
   */
  broadcast(frame: Frame, excludeNodeId?: string): number;
}

export type MessageHandler = (channel: string, sender: string, body: string) => void;

export interface GossipRouterOptions {
  channel: string;
  username: string;
  transport: GossipTransport;
  onMessage?: MessageHandler;
  dedup?: DedupCache;
  logger?: Logger;
}

export interface GossipStats {
  /** Unique messages handed to the delivery callback */
  delivered: number;
  /** Frames dropped because their id was already seen */
  duplicates: number;
  /** Frames dropped for carrying another channel */
  foreign: number;
  /** Individual stream writes made while forwarding */
  forwarded: number;
}

/**
 * Flooding with duplicate suppression.
 *
 * Every message is delivered and forwarded at most once per node; there is
 * no hop limit, propagation ends because every node drops ids it has seen.
 */
export class GossipRouter {
  private channel: string;
  private username: string;
  private transport: GossipTransport;
  private onMessage: MessageHandler | null;
  private dedup: DedupCache;
  private logger: Logger | null;
  private counters: GossipStats = { delivered: 0, duplicates: 0, foreign: 0, forwarded: 0 };

  constructor(options: GossipRouterOptions) {
    this.channel = options.channel;
    this.username = options.username;
    this.transport = options.transport;
    this.onMessage = options.onMessage ?? null;
    this.dedup = options.dedup ?? new DedupCache();
    this.logger = options.logger ?? null;
  }

  /**
   * Process a message received from `fromNodeId`.
   *
   * @returns true if the message was new and delivered
   */
  handleInbound(message: ChatMessage, fromNodeId?: string): boolean {
    if (message.channel !== this.channel) {
      this.counters.foreign++;
      return false;
    }

    if (!this.dedup.recordIfNew(message.id)) {
      this.counters.duplicates++;
      return false;
    }

    this.deliver(message);
    this.forward(message, fromNodeId);
    return true;
  }

  /**
   * Originate a message from the local user: echo it locally, then flood it.
   */
  originate(body: string): ChatMessage {
    const message = createChatMessage(this.channel, this.username, body);
    this.dedup.recordIfNew(message.id);
    this.deliver(message);
    this.forward(message);
    return message;
  }

  get stats(): GossipStats {
    return { ...this.counters };
  }

  get seenCount(): number {
    return this.dedup.size;
  }

  private deliver(message: ChatMessage): void {
    this.counters.delivered++;
    if (!this.onMessage) {
      return;
    }
    try {
      this.onMessage(message.channel, message.sender, message.body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`Message handler threw for ${message.id}: ${reason}`);
    }
  }

  private forward(message: ChatMessage, excludeNodeId?: string): void {
    const written = this.transport.broadcast({ type: 'chat', message }, excludeNodeId);
    this.counters.forwarded += written;
    this.logger?.debug(`Forwarded ${message.id} to ${written} stream(s)`);
  }
}
