import { EventEmitter } from 'node:events';
import { createSocket, type Socket } from 'node:dgram';
import type { Logger } from '../logger.js';
import { decodeBeacon, encodeBeacon, type BeaconPayload } from '../message/beacon.js';

/** Well-known UDP port every node listens and broadcasts on */
export const DISCOVERY_PORT = 54545;

/**
 * Time between beacons. A node is found within one interval of starting
 * unless datagrams are lost, in which case the next beacon retries.
 */
export const DISCOVERY_INTERVAL_MS = 3000;

export const BROADCAST_ADDRESS = '255.255.255.255';

/**
 * A beacon from another node on our channel.
 */
export interface Beacon extends BeaconPayload {
  /** Source address of the datagram; the host to dial */
  address: string;
}

export interface DiscoveryBeaconOptions {
  nodeId: string;
  channel: string;
  username: string;
  /** UDP port to bind and broadcast to (default: 54545) */
  port?: number;
  /** Beacon interval in ms (default: 3000) */
  intervalMs?: number;
  /** Destination of outgoing beacons (default: 255.255.255.255) */
  broadcastAddress?: string;
  logger?: Logger;
}

/**
 * Events emitted by DiscoveryBeacon
 */
export interface DiscoveryBeaconEvents {
  'beacon': (beacon: Beacon) => void;
}

/**
 * Periodic UDP broadcast announcing this node, plus a listener for
 * everyone else's. Best effort: no acknowledgements, lost datagrams are
 * covered by the next interval.
 */
export class DiscoveryBeacon extends EventEmitter {
  private socket: Socket | null = null;
  private timer: NodeJS.Timeout | null = null;
  private nodeId: string;
  private channel: string;
  private username: string;
  private port: number;
  private intervalMs: number;
  private broadcastAddress: string;
  private chatPort = 0;
  private logger: Logger | null;

  constructor(options: DiscoveryBeaconOptions) {
    super();
    this.nodeId = options.nodeId;
    this.channel = options.channel;
    this.username = options.username;
    this.port = options.port ?? DISCOVERY_PORT;
    this.intervalMs = options.intervalMs ?? DISCOVERY_INTERVAL_MS;
    this.broadcastAddress = options.broadcastAddress ?? BROADCAST_ADDRESS;
    this.logger = options.logger ?? null;
  }

  /**
   * Bind the discovery socket and start beaconing.
   * Rejects if the port cannot be bound.
   *
   * @param chatPort - Port our chat listener is bound to, advertised in beacons
   */
  start(chatPort: number): Promise<void> {
    if (this.socket) {
      return Promise.reject(new Error('Discovery beacon already started'));
    }
    this.chatPort = chatPort;

    return new Promise((resolve, reject) => {
      const socket = createSocket({ type: 'udp4', reuseAddr: true });
      this.socket = socket;
      let bound = false;

      socket.on('error', (error) => {
        if (!bound) {
          this.socket = null;
          socket.close();
          reject(error);
          return;
        }
        this.logger?.debug(`Discovery socket error: ${error.message}`);
      });

      socket.on('message', (data, rinfo) => {
        this.handleDatagram(data, rinfo.address);
      });

      socket.on('listening', () => {
        bound = true;
        try {
          socket.setBroadcast(true);
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          this.logger?.warn(`Could not enable broadcast: ${reason}`);
        }
        this.port = socket.address().port;
        this.announce();
        this.timer = setInterval(() => this.announce(), this.intervalMs);
        resolve();
      });

      socket.bind(this.port);
    });
  }

  /**
   * Stop beaconing and release the socket. Safe to call more than once.
   */
  stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const socket = this.socket;
    this.socket = null;
    if (!socket) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      socket.close(() => resolve());
    });
  }

  /**
   * Send one beacon now.
   */
  announce(): void {
    if (!this.socket) {
      return;
    }
    const payload = encodeBeacon({
      nodeId: this.nodeId,
      channel: this.channel,
      chatPort: this.chatPort,
      username: this.username,
    });
    this.socket.send(payload, this.port, this.broadcastAddress, (error) => {
      if (error) {
        this.logger?.debug(`Beacon send to ${this.broadcastAddress}:${this.port} failed: ${error.message}`);
      }
    });
  }

  /**
   * Filter one datagram. Foreign traffic, other channels and our own
   * beacons are dropped; anything else is emitted as 'beacon'.
   */
  handleDatagram(data: Buffer, remoteAddress: string): Beacon | null {
    const decoded = decodeBeacon(data);
    if (!decoded.ok) {
      this.logger?.debug(`Dropped datagram from ${remoteAddress}: ${decoded.reason}`);
      return null;
    }

    const payload = decoded.value;
    if (payload.channel !== this.channel || payload.nodeId === this.nodeId) {
      return null;
    }

    const beacon: Beacon = { ...payload, address: remoteAddress };
    this.emit('beacon', beacon);
    return beacon;
  }

  /**
   * Port the socket is bound to (the configured port before start).
   */
  getPort(): number {
    return this.port;
  }

  isRunning(): boolean {
    return this.socket !== null;
  }
}
