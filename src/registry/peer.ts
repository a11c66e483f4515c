/**
 * Handle to a live, framed stream to a remote node.
 */
export interface PeerConnection {
  /** Process-unique id of this stream */
  readonly id: number;
  /** Write one encoded frame; false when the stream is not open */
  send(data: string): boolean;
  close(): void;
  isOpen(): boolean;
}

/**
 * Where a peer says it can be reached, as learned from a beacon or handshake.
 */
export interface PeerAddress {
  nodeId: string;
  username: string;
  channel: string;
  address: string;
  chatPort: number;
}

/**
 * A known remote node on our channel
 */
export interface PeerRecord extends PeerAddress {
  /** Attached stream; absent until a handshake completes */
  connection?: PeerConnection;
  /** Consecutive failed dials since the last success */
  dialFailures: number;
  /** Unix timestamp (ms) when this record was created */
  discoveredAt: number;
}
