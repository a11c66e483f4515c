import type { Logger } from '../logger.js';

/**
 * How long a message id is remembered. Must exceed the worst-case time for a
 * message to cross the mesh; on a LAN that is well under a second per hop,
 * so two minutes leaves a wide margin even for stalled streams.
 */
export const DEFAULT_RETENTION_MS = 120_000;

/** Upper bound on remembered ids, independent of the retention window. */
export const DEFAULT_MAX_ENTRIES = 10_000;

export interface DedupCacheOptions {
  /** Retention window in ms (default: 120000) */
  retentionMs?: number;
  /** Maximum number of remembered ids (default: 10000) */
  maxEntries?: number;
  /** Clock, overridable for tests */
  now?: () => number;
  logger?: Logger;
}

/**
 * Bounded record of recently seen message ids.
 *
 * Entries live in insertion order, and since observedAt only grows, expired
 * entries are always at the front: pruning stops at the first live one.
 */
export class DedupCache {
  private seen = new Map<string, number>();
  private retentionMs: number;
  private maxEntries: number;
  private now: () => number;
  private logger: Logger | null;

  constructor(options: DedupCacheOptions = {}) {
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? null;

    if (this.retentionMs <= 0) {
      throw new Error(`retentionMs must be positive, got ${this.retentionMs}`);
    }
    if (this.maxEntries < 1) {
      throw new Error(`maxEntries must be at least 1, got ${this.maxEntries}`);
    }
  }

  /**
   * Check membership and insert in one step.
   *
   * @returns true the first time `messageId` is seen within the window,
   *          false on every later sighting
   */
  recordIfNew(messageId: string): boolean {
    this.prune();

    if (this.seen.has(messageId)) {
      return false;
    }

    this.seen.set(messageId, this.now());
    let evicted = 0;
    while (this.seen.size > this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) {
        break;
      }
      this.seen.delete(oldest.value);
      evicted++;
    }
    // prune() just ran, so anything evicted here was still inside the window
    if (evicted > 0) {
      this.logger?.warn(
        `Dedup cache full (${this.maxEntries} ids): evicted ${evicted} unexpired id(s); late duplicates of them will be delivered again`,
      );
    }
    return true;
  }

  /**
   * Whether `messageId` is currently remembered.
   */
  has(messageId: string): boolean {
    this.prune();
    return this.seen.has(messageId);
  }

  /**
   * Drop entries older than the retention window.
   *
   * @returns Number of entries removed
   */
  prune(): number {
    const cutoff = this.now() - this.retentionMs;
    let removed = 0;

    for (const [messageId, observedAt] of this.seen) {
      if (observedAt > cutoff) {
        break;
      }
      this.seen.delete(messageId);
      removed++;
    }

    return removed;
  }

  clear(): void {
    this.seen.clear();
  }

  get size(): number {
    return this.seen.size;
  }
}
