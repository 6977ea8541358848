/**
 * Q5 — In-Memory Cache Backend
 * ============================
 *
 * Process-local backend over TtlCache. Never unavailable.
 */

import type { Clock } from '../../../common/host.deps.js';
import { TtlCache, type TtlCacheStats } from '../../../shared/runtime/ttl-cache.js';
import type { CacheBackend } from './cache.types.js';

const DEFAULT_TTL_MS = 30 * 60 * 1000;

export class MemoryCacheBackend implements CacheBackend {
  readonly name = 'memory';
  private readonly cache: TtlCache<string>;

  constructor(options: { defaultTtlMs?: number; clock?: Clock } = {}) {
    this.cache = new TtlCache<string>(options.defaultTtlMs ?? DEFAULT_TTL_MS, options.clock);
  }

  async get(key: string): Promise<string | undefined> {
    return this.cache.get(key);
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    this.cache.set(key, value, ttlMs);
  }

  async exists(key: string): Promise<boolean> {
    return this.cache.has(key);
  }

  stats(): TtlCacheStats {
    return this.cache.stats();
  }

  prune(): number {
    return this.cache.prune();
  }
}
