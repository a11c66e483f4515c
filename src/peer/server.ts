import { EventEmitter } from 'node:events';
import type { IncomingMessage } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';

/**
 * Address the chat listener ended up bound to
 */
export interface BoundAddress {
  host: string;
  port: number;
}

/**
 * Events emitted by PeerServer
 */
export interface PeerServerEvents {
  'connection': (socket: WebSocket, remoteAddress: string) => void;
  'error': (error: Error) => void;
}

/**
 * Strip the IPv4-mapped prefix so inbound and discovered addresses compare equal.
 */
export function normalizeAddress(address: string | undefined): string {
  if (!address) {
    return 'unknown';
  }
  return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

/**
 * WebSocket server accepting peer streams. Every connection is accepted;
 * validation happens in the hello exchange on the stream itself.
 */
export class PeerServer extends EventEmitter {
  private wss: WebSocketServer | null = null;

  /**
   * Bind the listener. Port 0 picks any free port.
   */
  start(host: string, port: number): Promise<BoundAddress> {
    if (this.wss) {
      return Promise.reject(new Error('Server already started'));
    }

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({ host, port });
      this.wss = wss;
      let listening = false;

      wss.on('error', (error) => {
        if (!listening) {
          this.wss = null;
          reject(error);
          return;
        }
        if (this.listenerCount('error') > 0) {
          this.emit('error', error);
        }
      });

      wss.on('listening', () => {
        listening = true;
        const address = wss.address();
        if (typeof address === 'string') {
          resolve({ host, port });
          return;
        }
        resolve({ host: address.address, port: address.port });
      });

      wss.on('connection', (socket: WebSocket, request: IncomingMessage) => {
        this.emit('connection', socket, normalizeAddress(request.socket.remoteAddress));
      });
    });
  }

  /**
   * Stop accepting connections. Open streams are owned and closed by the manager.
   */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.wss) {
        resolve();
        return;
      }

      const wss = this.wss;
      this.wss = null;
      for (const client of wss.clients) {
        client.terminate();
      }
      wss.close((err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }
}
