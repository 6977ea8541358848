/**
 * TTL CACHE
 * =========
 *
 * In-memory cache with per-entry expiry. Expired entries are dropped
 * lazily on read or in bulk by prune().
 */

import { defaultClock, type Clock } from '../../common/host.deps.js';

type CacheEntry<T> = {
  value: T;
  expiresAt: number;
};

export interface TtlCacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export class TtlCache<T> {
  private map = new Map<string, CacheEntry<T>>();
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly defaultTtlMs: number,
    private readonly clock: Clock = defaultClock
  ) {}

  /**
   * Get value if not expired
   */
  get(key: string): T | undefined {
    const e = this.map.get(key);
    if (!e) {
      this.misses++;
      return undefined;
    }
    if (this.clock.now() >= e.expiresAt) {
      this.map.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return e.value;
  }

  /** Presence check; does not count towards hit/miss stats. */
  has(key: string): boolean {
    const e = this.map.get(key);
    if (!e) return false;
    if (this.clock.now() >= e.expiresAt) {
      this.map.delete(key);
      return false;
    }
    return true;
  }

  set(key: string, value: T, ttlMs?: number): void {
    this.map.set(key, {
      value,
      expiresAt: this.clock.now() + (ttlMs ?? this.defaultTtlMs),
    });
  }

  stats(): TtlCacheStats {
    return {
      size: this.map.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: this.hits + this.misses > 0
        ? Math.round((this.hits / (this.hits + this.misses)) * 100)
        : 0,
    };
  }

  /**
   * Prune expired entries
   */
  prune(): number {
    const now = this.clock.now();
    let pruned = 0;
    for (const [k, e] of this.map.entries()) {
      if (now >= e.expiresAt) {
        this.map.delete(k);
        pruned++;
      }
    }
    return pruned;
  }
}
