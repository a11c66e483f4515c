import { EventEmitter } from 'node:events';
import { WebSocket, type RawData } from 'ws';
import type { Logger } from '../logger.js';
import { decodeFrame, encodeFrame, type Frame, type HelloFrame } from '../message/frames.js';
import type { PeerConnection } from '../registry/peer.js';

let nextLinkId = 1;

export type LinkDirection = 'inbound' | 'outbound';

export interface PeerLinkOptions {
  /** Our own hello, sent as soon as the socket is open */
  hello: HelloFrame;
  direction: LinkDirection;
  remoteAddress: string;
  /** Close the stream if the remote hello does not arrive in time */
  helloTimeoutMs: number;
  logger?: Logger;
}

/**
 * Events emitted by PeerLink
 */
export interface PeerLinkEvents {
  'ready': (remote: HelloFrame) => void;
  'frame': (frame: Frame) => void;
  'closed': () => void;
  'error': (error: Error) => void;
}

/**
 * Normalize the data argument of a ws 'message' event.
 */
export function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf-8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf-8');
  }
  return data.toString('utf-8');
}

/**
 * One framed stream to a remote node, on either side of the dial.
 *
 * Both ends open with a hello; frames before the remote hello are dropped,
 * a hello for another channel (or from ourselves) closes the stream, and
 * malformed frames are dropped without closing it.
 */
export class PeerLink extends EventEmitter implements PeerConnection {
  readonly id: number;
  readonly direction: LinkDirection;
  readonly remoteAddress: string;
  private socket: WebSocket;
  private hello: HelloFrame;
  private remote: HelloFrame | null = null;
  private helloTimer: NodeJS.Timeout | null = null;
  private closed = false;
  private logger: Logger | null;

  constructor(socket: WebSocket, options: PeerLinkOptions) {
    super();
    this.id = nextLinkId++;
    this.socket = socket;
    this.hello = options.hello;
    this.direction = options.direction;
    this.remoteAddress = options.remoteAddress;
    this.logger = options.logger ?? null;

    this.helloTimer = setTimeout(() => {
      this.helloTimer = null;
      if (!this.remote) {
        this.logger?.debug(`No hello from ${this.describe()} within ${options.helloTimeoutMs}ms`);
        this.close();
      }
    }, options.helloTimeoutMs);

    if (socket.readyState === WebSocket.OPEN) {
      this.sendHello();
    } else {
      socket.once('open', () => this.sendHello());
    }

    socket.on('message', (data: RawData) => this.handleMessage(rawDataToString(data)));

    socket.on('close', () => {
      this.clearHelloTimer();
      if (!this.closed) {
        this.closed = true;
        this.emit('closed');
      }
    });

    socket.on('error', (error: Error) => this.reportError(error));
  }

  /**
   * The remote node's hello, once received.
   */
  getRemote(): HelloFrame | null {
    return this.remote;
  }

  isReady(): boolean {
    return this.remote !== null;
  }

  isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): boolean {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return false;
    }

    try {
      this.socket.send(data, (error) => {
        if (error) {
          this.logger?.debug(`Send to ${this.describe()} failed: ${error.message}`);
        }
      });
      return true;
    } catch (error) {
      this.reportError(error instanceof Error ? error : new Error(String(error)));
      return false;
    }
  }

  sendFrame(frame: Frame): boolean {
    return this.send(encodeFrame(frame));
  }

  /**
   * Tear the stream down immediately; 'closed' follows once the socket is gone.
   */
  close(): void {
    this.clearHelloTimer();
    this.socket.terminate();
  }

  describe(): string {
    const who = this.remote ? this.remote.nodeId : 'unknown';
    return `${this.direction} #${this.id} ${who}@${this.remoteAddress}`;
  }

  private sendHello(): void {
    this.sendFrame(this.hello);
  }

  private handleMessage(text: string): void {
    const decoded = decodeFrame(text);
    if (!decoded.ok) {
      this.logger?.debug(`Dropped frame from ${this.describe()}: ${decoded.reason}`);
      return;
    }
    const frame = decoded.value;

    if (!this.remote) {
      if (frame.type !== 'hello') {
        return;
      }
      if (frame.channel !== this.hello.channel) {
        this.logger?.debug(`Closing ${this.describe()}: channel '${frame.channel}' is not ours`);
        this.close();
        return;
      }
      if (frame.nodeId === this.hello.nodeId) {
        this.logger?.debug(`Closing ${this.describe()}: connected to ourselves`);
        this.close();
        return;
      }
      this.remote = frame;
      this.clearHelloTimer();
      this.emit('ready', frame);
      return;
    }

    if (frame.type === 'hello') {
      return;
    }
    this.emit('frame', frame);
  }

  private reportError(error: Error): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error);
    } else {
      this.logger?.debug(`Stream ${this.describe()} error: ${error.message}`);
    }
  }

  private clearHelloTimer(): void {
    if (this.helloTimer) {
      clearTimeout(this.helloTimer);
      this.helloTimer = null;
    }
  }
}
