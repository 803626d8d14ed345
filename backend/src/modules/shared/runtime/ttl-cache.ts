/**
 * TTL CACHE
 * =========
 *
 * In-memory cache whose entries carry the instant they were captured.
 * An entry is fresh while `now - capturedAt < ttlMs`.
 *
 * Used for:
 * - Verdict snapshots read from the store (10s TTL)
 */

import { defaultClock, type Clock } from '../../../common/host.deps.js';

export type CacheEntry<T> = {
  value: T;
  capturedAt: number;
};

export class TtlCache<T> {
  private map = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = defaultClock,
  ) {}

  /**
   * Get entry if still fresh. Expired entries are dropped.
   */
  get(key: string): CacheEntry<T> | null {
    const e = this.map.get(key);
    if (!e) {
      this.misses++;
      return null;
    }
    if (this.clock.now() - e.capturedAt >= this.ttlMs) {
      this.map.delete(key);
      this.misses++;
      return null;
    }
    this.hits++;
    return e;
  }

  /**
   * Store value. `capturedAt` defaults to now; pass the instant the value was
   * read when the read itself took time.
   */
  set(key: string, value: T, capturedAt: number = this.clock.now()): CacheEntry<T> {
    const entry = { value, capturedAt };
    this.map.set(key, entry);
    return entry;
  }

  del(key: string): void {
    this.map.delete(key);
  }

  get ttl(): number {
    return this.ttlMs;
  }

  stats() {
    return {
      size: this.map.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hits + this.misses > 0
        ? Math.round((this.hits / (this.hits + this.misses)) * 100)
        : 0,
    };
  }
}
