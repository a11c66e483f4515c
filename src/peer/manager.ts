import { EventEmitter } from 'node:events';
import type { WebSocket } from 'ws';
import type { Logger } from '../logger.js';
import { encodeFrame, type Frame, type HelloFrame } from '../message/frames.js';
import type { PeerAddress, PeerRecord } from '../registry/peer.js';
import { PeerTable } from '../registry/peer-table.js';
import { openPeerSocket } from './client.js';
import { PeerLink, type LinkDirection } from './link.js';
import { PeerServer, type BoundAddress } from './server.js';

/** Consecutive failed dials after which a peer record is dropped */
export const MAX_DIAL_FAILURES = 3;
export const HELLO_TIMEOUT_MS = 10_000;
export const DIAL_TIMEOUT_MS = 5_000;

export interface PeerManagerOptions {
  nodeId: string;
  username: string;
  channel: string;
  table?: PeerTable;
  logger?: Logger;
  helloTimeoutMs?: number;
  dialTimeoutMs?: number;
  maxDialFailures?: number;
}

/**
 * Events emitted by PeerManager
 */
export interface PeerManagerEvents {
  'peer-connected': (peer: PeerRecord) => void;
  'peer-disconnected': (nodeId: string) => void;
  'frame': (frame: Frame, fromNodeId: string) => void;
  'error': (error: Error) => void;
}

/**
 * Keeps a full mesh of streams to every same-channel peer: accepts inbound
 * streams, dials discovered peers, and fans frames out to the Peer Table.
 *
 * Two streams to the same node (both sides dialing at once) are allowed.
 * Only one is attached to the peer's record; the other is kept as a
 * fallback and promoted if the attached one closes.
 */
export class PeerManager extends EventEmitter {
  readonly table: PeerTable;
  private server: PeerServer | null = null;
  private links = new Set<PeerLink>();
  private pendingDials = new Set<string>();
  private nodeId: string;
  private username: string;
  private channel: string;
  private chatPort = 0;
  private stopping = false;
  private logger: Logger | null;
  private helloTimeoutMs: number;
  private dialTimeoutMs: number;
  private maxDialFailures: number;

  constructor(options: PeerManagerOptions) {
    super();
    this.nodeId = options.nodeId;
    this.username = options.username;
    this.channel = options.channel;
    this.table = options.table ?? new PeerTable();
    this.logger = options.logger ?? null;
    this.helloTimeoutMs = options.helloTimeoutMs ?? HELLO_TIMEOUT_MS;
    this.dialTimeoutMs = options.dialTimeoutMs ?? DIAL_TIMEOUT_MS;
    this.maxDialFailures = options.maxDialFailures ?? MAX_DIAL_FAILURES;
  }

  /**
   * Start listening for incoming peer streams
   */
  async start(host: string, port: number): Promise<BoundAddress> {
    if (this.server) {
      throw new Error('Server already started');
    }

    const server = new PeerServer();
    server.on('connection', (socket: WebSocket, remoteAddress: string) => {
      if (this.stopping) {
        socket.terminate();
        return;
      }
      this.adopt(socket, 'inbound', remoteAddress);
    });
    server.on('error', (error: Error) => this.reportError(error));

    const bound = await server.start(host, port);
    this.server = server;
    this.chatPort = bound.port;
    return bound;
  }

  /**
   * Close every stream and the listener
   */
  async stop(): Promise<void> {
    this.stopping = true;

    for (const link of this.links) {
      link.close();
    }
    this.links.clear();
    this.pendingDials.clear();
    this.table.clear();

    if (this.server) {
      const server = this.server;
      this.server = null;
      await server.stop();
    }
  }

  /**
   * React to a discovered peer: record it and dial it unless a stream is
   * already attached or a dial is in flight.
   */
  handleDiscovered(peer: PeerAddress): void {
    if (this.stopping || peer.channel !== this.channel || peer.nodeId === this.nodeId) {
      return;
    }

    const { changed } = this.table.upsert(peer);
    if (this.table.isConnected(peer.nodeId)) {
      return;
    }
    if (changed) {
      this.logger?.debug(`Discovered ${peer.nodeId} at ${peer.address}:${peer.chatPort}`);
    }
    this.dial(peer.address, peer.chatPort, peer.nodeId);
  }

  /**
   * Open an outbound stream. Failure is logged and, when the target's node
   * id is known, counted against its record.
   *
   * @returns The new stream, or null if a dial to that address is already pending
   */
  dial(address: string, port: number, expectedNodeId?: string): PeerLink | null {
    const key = `${address}:${port}`;
    if (this.stopping || this.pendingDials.has(key)) {
      return null;
    }
    this.pendingDials.add(key);

    const socket = openPeerSocket(address, port, this.dialTimeoutMs);
    const link = this.adopt(socket, 'outbound', address);

    link.once('ready', () => {
      this.pendingDials.delete(key);
    });
    link.once('closed', () => {
      if (!this.pendingDials.delete(key) || this.stopping) {
        return;
      }
      this.logger?.debug(`Dial to ${key} failed`);
      if (expectedNodeId && this.table.recordDialFailure(expectedNodeId, this.maxDialFailures)) {
        this.logger?.info(`Dropped ${expectedNodeId} after ${this.maxDialFailures} failed dials`);
      }
    });
    return link;
  }

  /**
   * Send a frame to every attached stream except the one to `excludeNodeId`.
   * Sends are independent; one failing does not stop the rest.
   *
   * @returns Number of streams written
   */
  broadcast(frame: Frame, excludeNodeId?: string): number {
    const data = encodeFrame(frame);
    let written = 0;

    for (const peer of this.table.connected()) {
      if (peer.nodeId === excludeNodeId || !peer.connection) {
        continue;
      }
      if (peer.connection.send(data)) {
        written++;
      }
    }

    return written;
  }

  /**
   * Send a frame over the stream attached to one peer.
   */
  sendTo(nodeId: string, frame: Frame): boolean {
    const connection = this.table.get(nodeId)?.connection;
    return connection ? connection.send(encodeFrame(frame)) : false;
  }

  /**
   * Number of open streams, duplicates included
   */
  connectionCount(): number {
    let count = 0;
    for (const link of this.links) {
      if (link.isReady() && link.isOpen()) {
        count++;
      }
    }
    return count;
  }

  getChatPort(): number {
    return this.chatPort;
  }

  private helloFrame(): HelloFrame {
    return {
      type: 'hello',
      nodeId: this.nodeId,
      username: this.username,
      channel: this.channel,
      chatPort: this.chatPort,
    };
  }

  private adopt(socket: WebSocket, direction: LinkDirection, remoteAddress: string): PeerLink {
    const link = new PeerLink(socket, {
      hello: this.helloFrame(),
      direction,
      remoteAddress,
      helloTimeoutMs: this.helloTimeoutMs,
      logger: this.logger ?? undefined,
    });
    this.links.add(link);

    link.on('ready', (remote: HelloFrame) => this.attach(link, remote));

    link.on('frame', (frame: Frame) => {
      const remote = link.getRemote();
      if (this.stopping || !remote) {
        return;
      }
      this.emit('frame', frame, remote.nodeId);
    });

    link.on('closed', () => {
      this.links.delete(link);
      const remote = link.getRemote();
      if (this.stopping || !remote) {
        return;
      }
      if (!this.table.detach(remote.nodeId, link)) {
        return;
      }
      if (this.promoteFallback(remote.nodeId)) {
        return;
      }
      this.logger?.info(`Peer ${remote.username || remote.nodeId} disconnected`);
      this.emit('peer-disconnected', remote.nodeId);
    });

    link.on('error', (error: Error) => {
      this.logger?.debug(`Stream ${link.describe()} error: ${error.message}`);
    });

    return link;
  }

  private attach(link: PeerLink, remote: HelloFrame): void {
    if (this.stopping) {
      link.close();
      return;
    }

    const attached = this.table.attach(this.addressOf(link, remote), link);
    if (!attached) {
      this.logger?.debug(`Keeping ${link.describe()} as a duplicate stream`);
      return;
    }

    const record = this.table.get(remote.nodeId);
    if (record) {
      this.logger?.info(`Peer ${remote.username || remote.nodeId} connected (${link.direction})`);
      this.emit('peer-connected', record);
    }
  }

  /**
   * Attach a surviving duplicate stream after the attached one closed.
   */
  private promoteFallback(nodeId: string): boolean {
    for (const candidate of this.links) {
      const remote = candidate.getRemote();
      if (remote?.nodeId === nodeId && candidate.isOpen()) {
        return this.table.attach(this.addressOf(candidate, remote), candidate);
      }
    }
    return false;
  }

  private addressOf(link: PeerLink, remote: HelloFrame): PeerAddress {
    return {
      nodeId: remote.nodeId,
      username: remote.username,
      channel: remote.channel,
      address: link.remoteAddress,
      chatPort: remote.chatPort,
    };
  }

  private reportError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    } else {
      this.logger?.warn(`Peer server error: ${error.message}`);
    }
  }
}
