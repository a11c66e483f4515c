import WebSocket from 'ws';

/**
 * Build the ws:// URL of a peer's chat listener.
 */
export function peerUrl(address: string, port: number): string {
  const host = address.includes(':') ? `[${address}]` : address;
  return `ws://${host}:${port}`;
}

/**
 * Open an outbound stream to a peer. Failures arrive as 'error' then
 * 'close' on the returned socket; nothing is retried here, discovery
 * triggers the next attempt.
 *
 * @param handshakeTimeoutMs - Give up if the upgrade has not completed in time
 */
export function openPeerSocket(address: string, port: number, handshakeTimeoutMs: number): WebSocket {
  return new WebSocket(peerUrl(address, port), { handshakeTimeout: handshakeTimeoutMs });
}
