import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DedupCache } from '../src/gossip/dedup-cache.js';
import { GossipRouter, type GossipTransport } from '../src/gossip/router.js';
import { createChatMessage, type Frame } from '../src/message/frames.js';

class RecordingTransport implements GossipTransport {
  sent: Array<{ frame: Frame; excludeNodeId?: string }> = [];

  constructor(private readonly streams = 2) {}

  broadcast(frame: Frame, excludeNodeId?: string): number {
    this.sent.push({ frame, excludeNodeId });
    return this.streams;
  }
}

interface Delivery {
  node: string;
  sender: string;
  body: string;
}

/**
 * In-memory full mesh: every broadcast is queued for every other node and
 * drained in order, like frames crossing real streams.
 */
class Mesh {
  readonly routers = new Map<string, GossipRouter>();
  readonly deliveries: Delivery[] = [];
  frames = 0;
  private queue: Array<{ to: string; from: string; frame: Frame }> = [];

  constructor(names: string[], channel = 'general') {
    for (const name of names) {
      const transport: GossipTransport = {
        broadcast: (frame, excludeNodeId) => {
          let written = 0;
          for (const other of this.routers.keys()) {
            if (other === name || other === excludeNodeId) {
              continue;
            }
            this.queue.push({ to: other, from: name, frame });
            written++;
          }
          return written;
        },
      };
      this.routers.set(
        name,
        new GossipRouter({
          channel,
          username: name,
          transport,
          onMessage: (_channel, sender, body) => this.deliveries.push({ node: name, sender, body }),
        }),
      );
    }
  }

  router(name: string): GossipRouter {
    const router = this.routers.get(name);
    assert.ok(router, `no router ${name}`);
    return router;
  }

  drain(): void {
    while (this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next || next.frame.type !== 'chat') {
        continue;
      }
      this.frames++;
      this.router(next.to).handleInbound(next.frame.message, next.from);
    }
  }
}

describe('GossipRouter', () => {
  it('should deliver a new message once and forward it excluding the sender', () => {
    const transport = new RecordingTransport(3);
    const delivered: string[] = [];
    const router = new GossipRouter({
      channel: 'general',
      username: 'alice',
      transport,
      onMessage: (channel, sender, body) => delivered.push(`${channel}/${sender}/${body}`),
    });
    const message = createChatMessage('general', 'bob', 'hi');

    assert.strictEqual(router.handleInbound(message, 'bob-00000001'), true);
    assert.strictEqual(router.handleInbound(message, 'carol-00000002'), false);

    assert.deepStrictEqual(delivered, ['general/bob/hi']);
    assert.strictEqual(transport.sent.length, 1);
    assert.strictEqual(transport.sent[0].excludeNodeId, 'bob-00000001');
    assert.deepStrictEqual(router.stats, { delivered: 1, duplicates: 1, foreign: 0, forwarded: 3 });
  });

  it('should drop messages for another channel without forwarding', () => {
    const transport = new RecordingTransport();
    const delivered: string[] = [];
    const router = new GossipRouter({
      channel: 'general',
      username: 'alice',
      transport,
      onMessage: (_channel, _sender, body) => delivered.push(body),
    });

    assert.strictEqual(router.handleInbound(createChatMessage('random', 'bob', 'elsewhere')), false);
    assert.deepStrictEqual(delivered, []);
    assert.strictEqual(transport.sent.length, 0);
    assert.strictEqual(router.stats.foreign, 1);
    assert.strictEqual(router.seenCount, 0);
  });

  it('should echo originated messages locally and ignore them when they come back', () => {
    const transport = new RecordingTransport();
    const delivered: string[] = [];
    const router = new GossipRouter({
      channel: 'general',
      username: 'alice',
      transport,
      onMessage: (_channel, sender, body) => delivered.push(`${sender}: ${body}`),
    });

    const message = router.originate('hello');

    assert.strictEqual(message.sender, 'alice');
    assert.strictEqual(message.channel, 'general');
    assert.deepStrictEqual(delivered, ['alice: hello']);
    assert.strictEqual(transport.sent[0].excludeNodeId, undefined);
    assert.strictEqual(router.handleInbound(message, 'bob-00000001'), false);
    assert.deepStrictEqual(delivered, ['alice: hello']);
  });

  it('should keep going when the delivery handler throws', () => {
    const transport = new RecordingTransport(1);
    const router = new GossipRouter({
      channel: 'general',
      username: 'alice',
      transport,
      onMessage: () => {
        throw new Error('handler failed');
      },
    });

    assert.strictEqual(router.handleInbound(createChatMessage('general', 'bob', 'hi')), true);
    assert.strictEqual(transport.sent.length, 1);
    assert.strictEqual(router.stats.delivered, 1);
  });

  it('should deliver again once the id has left the dedup window', () => {
    let now = 0;
    const transport = new RecordingTransport(1);
    const router = new GossipRouter({
      channel: 'general',
      username: 'alice',
      transport,
      dedup: new DedupCache({ retentionMs: 100, now: () => now }),
    });
    const message = createChatMessage('general', 'bob', 'hi');

    assert.strictEqual(router.handleInbound(message), true);
    now = 100;
    assert.strictEqual(router.handleInbound(message), true);
  });

  describe('flooding over a full mesh', () => {
    it('should deliver exactly once per node and terminate', () => {
      const mesh = new Mesh(['a', 'b', 'c', 'd']);

      mesh.router('a').originate('hi');
      mesh.drain();

      const bodies = mesh.deliveries.map((d) => `${d.node}<-${d.sender}:${d.body}`).sort();
      assert.deepStrictEqual(bodies, ['a<-a:hi', 'b<-a:hi', 'c<-a:hi', 'd<-a:hi']);
      // a sends 3, each of b, c and d forwards to the 2 nodes other than a
      assert.strictEqual(mesh.frames, 9);
      for (const name of ['b', 'c', 'd']) {
        assert.strictEqual(mesh.router(name).stats.duplicates, 2);
      }
    });

    it('should deliver concurrent messages from different origins everywhere', () => {
      const mesh = new Mesh(['a', 'b', 'c']);

      mesh.router('a').originate('from a');
      mesh.router('c').originate('from c');
      mesh.drain();

      for (const name of ['a', 'b', 'c']) {
        const received = mesh.deliveries
          .filter((d) => d.node === name)
          .map((d) => d.body)
          .sort();
        assert.deepStrictEqual(received, ['from a', 'from c']);
      }
    });
  });
});
