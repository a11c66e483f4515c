import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert';
import WebSocket from 'ws';
import { createChatMessage, encodeFrame, type Frame } from '../src/message/frames.js';
import { PeerManager } from '../src/peer/manager.js';
import { peerUrl } from '../src/peer/client.js';
import { normalizeAddress, PeerServer } from '../src/peer/server.js';
import { waitFor } from './helpers.js';

const HOST = '127.0.0.1';

describe('peer transport', () => {
  const managers: PeerManager[] = [];

  function createManager(name: string, channel = 'general', helloTimeoutMs = 2000): PeerManager {
    const manager = new PeerManager({
      nodeId: `${name}-0000000${managers.length + 1}`,
      username: name,
      channel,
      helloTimeoutMs,
      dialTimeoutMs: 1000,
    });
    managers.push(manager);
    return manager;
  }

  afterEach(async () => {
    await Promise.all(managers.map((m) => m.stop()));
    managers.length = 0;
  });

  describe('helpers', () => {
    it('should build ws URLs and normalize mapped addresses', () => {
      assert.strictEqual(peerUrl('10.0.0.5', 4000), 'ws://10.0.0.5:4000');
      assert.strictEqual(peerUrl('fe80::1', 4000), 'ws://[fe80::1]:4000');
      assert.strictEqual(normalizeAddress('::ffff:10.0.0.5'), '10.0.0.5');
      assert.strictEqual(normalizeAddress(undefined), 'unknown');
    });
  });

  it('should connect two managers and exchange frames both ways', async () => {
    const alice = createManager('alice');
    const bob = createManager('bob');
    const alicePort = (await alice.start(HOST, 0)).port;
    await bob.start(HOST, 0);

    const aliceFrames: Array<{ frame: Frame; from: string }> = [];
    const bobFrames: Array<{ frame: Frame; from: string }> = [];
    alice.on('frame', (frame: Frame, from: string) => aliceFrames.push({ frame, from }));
    bob.on('frame', (frame: Frame, from: string) => bobFrames.push({ frame, from }));

    assert.ok(bob.dial(HOST, alicePort));
    await waitFor(() => alice.table.size === 1 && bob.table.size === 1, 3000, 'both sides connected');

    const aliceView = alice.table.get('bob-00000002');
    assert.ok(aliceView);
    assert.strictEqual(aliceView.username, 'bob');
    assert.strictEqual(aliceView.address, HOST);
    assert.strictEqual(aliceView.chatPort, bob.getChatPort());

    const message = createChatMessage('general', 'alice', 'hi');
    assert.strictEqual(alice.broadcast({ type: 'chat', message }), 1);
    assert.strictEqual(bob.sendTo('alice-00000001', { type: 'chat', message }), true);

    await waitFor(() => aliceFrames.length === 1 && bobFrames.length === 1, 3000, 'frames');
    assert.deepStrictEqual(bobFrames[0], { frame: { type: 'chat', message }, from: 'alice-00000001' });
    assert.strictEqual(aliceFrames[0].from, 'bob-00000002');
  });

  it('should not write to the excluded peer', async () => {
    const alice = createManager('alice');
    const bob = createManager('bob');
    const alicePort = (await alice.start(HOST, 0)).port;
    await bob.start(HOST, 0);

    bob.dial(HOST, alicePort);
    await waitFor(() => alice.table.size === 1, 3000, 'connection');

    const message = createChatMessage('general', 'alice', 'hi');
    assert.strictEqual(alice.broadcast({ type: 'chat', message }, 'bob-00000002'), 0);
  });

  it('should close streams from another channel', async () => {
    const alice = createManager('alice', 'general');
    const mallory = createManager('mallory', 'random');
    const alicePort = (await alice.start(HOST, 0)).port;
    await mallory.start(HOST, 0);

    let connected = 0;
    alice.on('peer-connected', () => connected++);

    const link = mallory.dial(HOST, alicePort);
    assert.ok(link);
    let closed = false;
    link.once('closed', () => {
      closed = true;
    });

    await waitFor(() => closed, 3000, 'stream closed');
    assert.strictEqual(connected, 0);
    assert.strictEqual(alice.table.size, 0);
    assert.strictEqual(mallory.table.size, 0);
  });

  it('should close a stream that never says hello', async () => {
    const alice = createManager('alice', 'general', 150);
    const port = (await alice.start(HOST, 0)).port;

    const socket = new WebSocket(peerUrl(HOST, port));
    const code = await new Promise<number>((resolve) => {
      socket.on('close', (closeCode: number) => resolve(closeCode));
      socket.on('error', () => {});
    });

    assert.strictEqual(typeof code, 'number');
    assert.strictEqual(alice.table.size, 0);
  });

  it('should drop malformed frames and frames before hello without closing', async () => {
    const alice = createManager('alice');
    const port = (await alice.start(HOST, 0)).port;
    const frames: Frame[] = [];
    alice.on('frame', (frame: Frame) => frames.push(frame));

    const socket = new WebSocket(peerUrl(HOST, port));
    await new Promise<void>((resolve, reject) => {
      socket.once('open', () => resolve());
      socket.once('error', reject);
    });

    const early = createChatMessage('general', 'raw', 'too early');
    const later = createChatMessage('general', 'raw', 'after hello');
    try {
      socket.send(encodeFrame({ type: 'chat', message: early }));
      socket.send(encodeFrame({ type: 'hello', nodeId: 'raw-0000000f', username: 'raw', channel: 'general', chatPort: 4999 }));
      socket.send('{ not json');
      socket.send(JSON.stringify({ type: 'gossip' }));
      socket.send(encodeFrame({ type: 'chat', message: later }));

      await waitFor(() => frames.length === 1, 3000, 'frame after hello');
      assert.deepStrictEqual(frames, [{ type: 'chat', message: later }]);
      assert.strictEqual(alice.table.isConnected('raw-0000000f'), true);
    } finally {
      socket.terminate();
    }

    await waitFor(() => alice.table.size === 0, 3000, 'peer removed');
  });

  it('should emit peer-disconnected when the remote stops', async () => {
    const alice = createManager('alice');
    const bob = createManager('bob');
    const alicePort = (await alice.start(HOST, 0)).port;
    await bob.start(HOST, 0);

    const gone: string[] = [];
    alice.on('peer-disconnected', (nodeId: string) => gone.push(nodeId));

    bob.dial(HOST, alicePort);
    await waitFor(() => alice.table.size === 1, 3000, 'connection');

    await bob.stop();
    await waitFor(() => gone.length === 1, 3000, 'disconnect');
    assert.deepStrictEqual(gone, ['bob-00000002']);
    assert.strictEqual(alice.table.size, 0);
  });

  it('should keep a duplicate stream and promote it when the attached one closes', async () => {
    const alice = createManager('alice');
    const bob = createManager('bob');
    const alicePort = (await alice.start(HOST, 0)).port;
    const bobPort = (await bob.start(HOST, 0)).port;

    const first = bob.dial(HOST, alicePort);
    assert.ok(first);
    await waitFor(() => alice.table.size === 1 && bob.table.size === 1, 3000, 'first stream');
    alice.dial(HOST, bobPort);
    await waitFor(() => alice.connectionCount() === 2 && bob.connectionCount() === 2, 3000, 'second stream');

    let disconnected = 0;
    bob.on('peer-disconnected', () => disconnected++);
    first.close();

    await waitFor(() => bob.connectionCount() === 1, 3000, 'first stream closed');
    assert.strictEqual(bob.table.isConnected('alice-00000001'), true);
    assert.strictEqual(disconnected, 0);

    const frames: Frame[] = [];
    alice.on('frame', (frame: Frame) => frames.push(frame));
    const message = createChatMessage('general', 'bob', 'still here');
    assert.strictEqual(bob.broadcast({ type: 'chat', message }), 1);
    await waitFor(() => frames.length === 1, 3000, 'frame over fallback');
  });

  it('should drop a discovered peer after repeated failed dials', async () => {
    const closedServer = new PeerServer();
    const deadPort = (await closedServer.start(HOST, 0)).port;
    await closedServer.stop();

    const alice = createManager('alice');
    await alice.start(HOST, 0);
    const ghost = { nodeId: 'ghost-00000009', username: 'ghost', channel: 'general', address: HOST, chatPort: deadPort };

    for (let attempt = 1; attempt <= 3; attempt++) {
      alice.handleDiscovered(ghost);
      if (attempt < 3) {
        await waitFor(() => alice.table.get(ghost.nodeId)?.dialFailures === attempt, 3000, `failure ${attempt}`);
      }
    }

    await waitFor(() => !alice.table.has(ghost.nodeId), 3000, 'record dropped');
  });

  it('should ignore discovered peers on another channel and itself', async () => {
    const alice = createManager('alice');
    await alice.start(HOST, 0);

    alice.handleDiscovered({ nodeId: 'bob-00000002', username: 'bob', channel: 'random', address: HOST, chatPort: 1 });
    alice.handleDiscovered({ nodeId: 'alice-00000001', username: 'alice', channel: 'general', address: HOST, chatPort: 1 });

    assert.strictEqual(alice.table.size, 0);
  });

  it('should refuse to start twice', async () => {
    const alice = createManager('alice');
    await alice.start(HOST, 0);
    await assert.rejects(alice.start(HOST, 0), /already started/);
  });
});
