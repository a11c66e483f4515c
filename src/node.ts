import { DiscoveryBeacon, DISCOVERY_INTERVAL_MS, type Beacon } from './discovery/beacon.js';
import { DedupCache, type DedupCacheOptions } from './gossip/dedup-cache.js';
import { GossipRouter, type GossipStats, type MessageHandler } from './gossip/router.js';
import type { Logger } from './logger.js';
import type { ChatMessage, ControlFrame, DirectFrame, Frame } from './message/frames.js';
import { PeerManager } from './peer/manager.js';
import type { BoundAddress } from './peer/server.js';
import type { PeerRecord } from './registry/peer.js';
import { createNodeId, parseHostPort, type HostPort } from './utils.js';

export const DEFAULT_HOST = '0.0.0.0';

export type DirectHandler = (sender: string, recipient: string, body: string) => void;

export type ControlHandler = (sender: string, ctrl: string, data: Record<string, unknown>) => void;

export interface DiscoveryOptions {
  /** Set false to rely on static peers only (default: true) */
  enabled?: boolean;
  /** UDP port (default: 54545) */
  port?: number;
  /** Beacon and static-peer retry interval in ms (default: 3000) */
  intervalMs?: number;
  /** Beacon destination (default: 255.255.255.255) */
  broadcastAddress?: string;
}

export interface ChatNodeOptions {
  /** Display name attached to every message we originate */
  username: string;
  /** Room; only peers and messages with the same channel are seen */
  channel: string;
  /** Chat listener address (default: 0.0.0.0) */
  host?: string;
  /** Chat listener port, 0 for any free port (default: 0) */
  port?: number;
  /** Called once per unique message, our own included */
  onMessage?: MessageHandler;
  /** Called for direct messages addressed to us */
  onDirect?: DirectHandler;
  /** Called for control messages addressed to us */
  onControl?: ControlHandler;
  logger?: Logger;
  discovery?: DiscoveryOptions;
  /** Peers to dial without waiting for a beacon, as "host:port" or HostPort */
  peers?: Array<string | HostPort>;
  dedup?: Omit<DedupCacheOptions, 'logger'>;
  /** Close streams that send no hello within this many ms (default: 10000) */
  helloTimeoutMs?: number;
  /** Outbound dial handshake timeout in ms (default: 5000) */
  dialTimeoutMs?: number;
}

export interface NodeStatus {
  nodeId: string;
  username: string;
  channel: string;
  host: string;
  port: number;
  /** Peers with an attached stream */
  peers: number;
  /** Open streams, duplicates included */
  connections: number;
  /** Message ids currently remembered */
  seen: number;
  gossip: GossipStats;
}

type NodeState = 'idle' | 'starting' | 'running' | 'stopped';

interface StaticPeer extends HostPort {
  /** Learned from the hello of the first successful dial */
  nodeId?: string;
}

/**
 * A chat node: discovery, the peer mesh and gossip behind start/send/stop.
 *
 * Preconditions: start() once, send() only while running, stop() once.
 * Violations throw.
 */
export class ChatNode {
  readonly nodeId: string;
  readonly username: string;
  readonly channel: string;
  private host: string;
  private port: number;
  private state: NodeState = 'idle';
  private manager: PeerManager;
  private router: GossipRouter;
  private beacon: DiscoveryBeacon | null;
  private staticPeers: StaticPeer[];
  private retryTimer: NodeJS.Timeout | null = null;
  private retryIntervalMs: number;
  private onDirect: DirectHandler | null;
  private onControl: ControlHandler | null;
  private logger: Logger | null;

  constructor(options: ChatNodeOptions) {
    if (!options.username) {
      throw new Error('username is required');
    }
    if (!options.channel) {
      throw new Error('channel is required');
    }

    this.username = options.username;
    this.channel = options.channel;
    this.nodeId = createNodeId(options.username);
    this.host = options.host ?? DEFAULT_HOST;
    this.port = options.port ?? 0;
    this.logger = options.logger ?? null;
    this.onDirect = options.onDirect ?? null;
    this.onControl = options.onControl ?? null;
    this.retryIntervalMs = options.discovery?.intervalMs ?? DISCOVERY_INTERVAL_MS;
    this.staticPeers = (options.peers ?? []).map((peer) =>
      typeof peer === 'string' ? parseHostPort(peer) : { ...peer },
    );

    this.manager = new PeerManager({
      nodeId: this.nodeId,
      username: this.username,
      channel: this.channel,
      logger: options.logger,
      helloTimeoutMs: options.helloTimeoutMs,
      dialTimeoutMs: options.dialTimeoutMs,
    });

    this.router = new GossipRouter({
      channel: this.channel,
      username: this.username,
      transport: this.manager,
      onMessage: options.onMessage,
      dedup: new DedupCache({ ...options.dedup, logger: options.logger }),
      logger: options.logger,
    });

    this.beacon = options.discovery?.enabled === false
      ? null
      : new DiscoveryBeacon({
          nodeId: this.nodeId,
          channel: this.channel,
          username: this.username,
          port: options.discovery?.port,
          intervalMs: options.discovery?.intervalMs,
          broadcastAddress: options.discovery?.broadcastAddress,
          logger: options.logger,
        });

    this.manager.on('frame', (frame: Frame, fromNodeId: string) => this.handleFrame(frame, fromNodeId));
    this.manager.on('error', (error: Error) => {
      this.logger?.warn(`Peer manager error: ${error.message}`);
    });
    this.beacon?.on('beacon', (beacon: Beacon) => {
      this.manager.handleDiscovered({
        nodeId: beacon.nodeId,
        username: beacon.username,
        channel: beacon.channel,
        address: beacon.address,
        chatPort: beacon.chatPort,
      });
    });
  }

  /**
   * Bind the chat listener and the discovery socket, then start beaconing
   * and dialing static peers. Rejects if either socket cannot be bound.
   */
  async start(): Promise<BoundAddress> {
    if (this.state !== 'idle') {
      throw new Error(`Cannot start a node that is ${this.state}`);
    }
    this.state = 'starting';

    let bound: BoundAddress;
    try {
      bound = await this.manager.start(this.host, this.port);
    } catch (error) {
      this.state = 'stopped';
      throw error;
    }
    this.host = bound.host;
    this.port = bound.port;

    if (this.beacon) {
      try {
        await this.beacon.start(bound.port);
      } catch (error) {
        this.state = 'stopped';
        await this.manager.stop();
        throw error;
      }
    }

    this.state = 'running';
    this.logger?.info(`Node ${this.nodeId} listening on ${bound.host}:${bound.port} in '${this.channel}'`);

    if (this.staticPeers.length > 0) {
      this.dialStaticPeers();
      this.retryTimer = setInterval(() => this.dialStaticPeers(), this.retryIntervalMs);
    }

    return bound;
  }

  /**
   * Originate a message. Fire-and-forget: returns once it is handed to every
   * connected stream, with no delivery confirmation.
   */
  send(text: string): ChatMessage {
    this.assertRunning('send');
    return this.router.originate(text);
  }

  /**
   * Send a direct message to the connected peer going by `username`.
   * Not gossiped.
   *
   * @returns false if no such peer is connected
   */
  sendDirect(username: string, text: string): boolean {
    this.assertRunning('sendDirect');
    return this.sendToUser(username, {
      type: 'direct',
      channel: this.channel,
      sender: this.username,
      to: username,
      body: text,
      createdAt: Date.now(),
    });
  }

  /**
   * Send an application-defined control signal to the connected peer going
   * by `username`. Not gossiped.
   *
   * @returns false if no such peer is connected
   */
  sendControl(username: string, ctrl: string, data: Record<string, unknown> = {}): boolean {
    this.assertRunning('sendControl');
    if (ctrl === '') {
      throw new Error('ctrl must be a non-empty string');
    }
    return this.sendToUser(username, {
      type: 'control',
      channel: this.channel,
      sender: this.username,
      to: username,
      ctrl,
      data,
      createdAt: Date.now(),
    });
  }

  /**
   * Dial a peer by address now, outside of discovery.
   *
   * @returns false if a dial to that address is already in flight
   */
  addPeer(address: string, port: number): boolean {
    this.assertRunning('addPeer');
    return this.manager.dial(address, port) !== null;
  }

  /**
   * Stop all background activity and close every socket.
   * No messages are delivered afterwards.
   */
  async stop(): Promise<void> {
    if (this.state !== 'running') {
      throw new Error(`Cannot stop a node that is ${this.state}`);
    }
    this.state = 'stopped';

    if (this.retryTimer) {
      clearInterval(this.retryTimer);
      this.retryTimer = null;
    }
    await this.beacon?.stop();
    await this.manager.stop();
    this.logger?.info(`Node ${this.nodeId} stopped`);
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  listPeers(): PeerRecord[] {
    return this.manager.table.snapshot();
  }

  status(): NodeStatus {
    return {
      nodeId: this.nodeId,
      username: this.username,
      channel: this.channel,
      host: this.host,
      port: this.port,
      peers: this.manager.table.connected().length,
      connections: this.manager.connectionCount(),
      seen: this.router.seenCount,
      gossip: this.router.stats,
    };
  }

  private handleFrame(frame: Frame, fromNodeId: string): void {
    if (this.state !== 'running') {
      return;
    }

    switch (frame.type) {
      case 'chat':
        this.router.handleInbound(frame.message, fromNodeId);
        return;
      case 'direct':
        this.handleDirect(frame);
        return;
      case 'control':
        this.handleControl(frame);
        return;
      case 'hello':
        return;
    }
  }

  private handleDirect(frame: DirectFrame): void {
    if (frame.channel !== this.channel || frame.to !== this.username || !this.onDirect) {
      return;
    }
    try {
      this.onDirect(frame.sender, frame.to, frame.body);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`Direct message handler threw: ${reason}`);
    }
  }

  private handleControl(frame: ControlFrame): void {
    if (frame.channel !== this.channel || frame.to !== this.username || !this.onControl) {
      return;
    }
    try {
      this.onControl(frame.sender, frame.ctrl, frame.data);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger?.warn(`Control handler threw for '${frame.ctrl}': ${reason}`);
    }
  }

  private sendToUser(username: string, frame: DirectFrame | ControlFrame): boolean {
    const peer = this.manager.table.findByUsername(username);
    return peer ? this.manager.sendTo(peer.nodeId, frame) : false;
  }

  private dialStaticPeers(): void {
    for (const peer of this.staticPeers) {
      if (peer.nodeId && this.manager.table.isConnected(peer.nodeId)) {
        continue;
      }
      const link = this.manager.dial(peer.address, peer.port);
      link?.once('ready', () => {
        peer.nodeId = link.getRemote()?.nodeId;
      });
    }
  }

  private assertRunning(operation: string): void {
    if (this.state !== 'running') {
      throw new Error(`Cannot ${operation}: node is ${this.state}`);
    }
  }
}
