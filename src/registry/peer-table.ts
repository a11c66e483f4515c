import type { PeerAddress, PeerConnection, PeerRecord } from './peer.js';

export interface UpsertResult {
  record: PeerRecord;
  /** True when the peer is new or its dial address moved */
  changed: boolean;
}

/**
 * Node id -> PeerRecord. Every mutation from discovery, the accept path and
 * stream-close handlers goes through these methods; readers get copies.
 */
export class PeerTable {
  private peers = new Map<string, PeerRecord>();
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /**
   * Insert a peer or refresh its address.
   */
  upsert(peer: PeerAddress): UpsertResult {
    const existing = this.peers.get(peer.nodeId);
    if (!existing) {
      const record: PeerRecord = { ...peer, dialFailures: 0, discoveredAt: this.now() };
      this.peers.set(peer.nodeId, record);
      return { record: { ...record }, changed: true };
    }

    const moved = existing.address !== peer.address || existing.chatPort !== peer.chatPort;
    existing.address = peer.address;
    existing.chatPort = peer.chatPort;
    existing.username = peer.username;
    existing.channel = peer.channel;
    if (moved) {
      existing.dialFailures = 0;
    }
    return { record: { ...existing }, changed: moved };
  }

  /**
   * Attach a freshly handshaken stream, creating the record if needed.
   *
   * @returns false if another open stream is already attached; the caller
   *          keeps the new one as an unattached duplicate
   */
  attach(peer: PeerAddress, connection: PeerConnection): boolean {
    const existing = this.peers.get(peer.nodeId);
    if (existing?.connection && existing.connection !== connection && existing.connection.isOpen()) {
      return false;
    }

    if (existing) {
      existing.username = peer.username;
      existing.channel = peer.channel;
      existing.connection = connection;
      existing.dialFailures = 0;
      return true;
    }

    this.peers.set(peer.nodeId, {
      ...peer,
      connection,
      dialFailures: 0,
      discoveredAt: this.now(),
    });
    return true;
  }

  /**
   * A stream closed. Removes the peer only when that stream is the attached one.
   *
   * @returns true if the peer was removed
   */
  detach(nodeId: string, connection: PeerConnection): boolean {
    const record = this.peers.get(nodeId);
    if (!record || record.connection !== connection) {
      return false;
    }
    return this.peers.delete(nodeId);
  }

  /**
   * Count a failed dial; the record is dropped once `maxFailures` is reached.
   *
   * @returns true if the peer was removed
   */
  recordDialFailure(nodeId: string, maxFailures: number): boolean {
    const record = this.peers.get(nodeId);
    if (!record || record.connection?.isOpen()) {
      return false;
    }
    record.dialFailures++;
    if (record.dialFailures >= maxFailures) {
      return this.peers.delete(nodeId);
    }
    return false;
  }

  get(nodeId: string): PeerRecord | undefined {
    const record = this.peers.get(nodeId);
    return record ? { ...record } : undefined;
  }

  has(nodeId: string): boolean {
    return this.peers.has(nodeId);
  }

  isConnected(nodeId: string): boolean {
    return this.peers.get(nodeId)?.connection?.isOpen() ?? false;
  }

  /**
   * First connected peer going by `username`.
   */
  findByUsername(username: string): PeerRecord | undefined {
    for (const record of this.peers.values()) {
      if (record.username === username && record.connection?.isOpen()) {
        return { ...record };
      }
    }
    return undefined;
  }

  snapshot(): PeerRecord[] {
    return Array.from(this.peers.values(), (record) => ({ ...record }));
  }

  /**
   * Records with an open attached stream.
   */
  connected(): PeerRecord[] {
    return this.snapshot().filter((record) => record.connection?.isOpen() ?? false);
  }

  clear(): void {
    this.peers.clear();
  }

  get size(): number {
    return this.peers.size;
  }
}
