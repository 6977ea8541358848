/**
 * Q5 — Cache Backend Contract
 * ===========================
 *
 * String key/value store with per-entry TTL. A miss is undefined; a
 * transport failure raises BackendUnavailableError.
 */

import type { StructuredQuote } from '../contracts/quote.types.js';

export interface CacheBackend {
  readonly name: string;
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlMs: number): Promise<void>;
  exists(key: string): Promise<boolean>;
}

/** Stored value behind every quote cache key (JSON encoded). */
export interface CachedQuoteEnvelope {
  quote: StructuredQuote;
  cachedAt: number; // epoch ms
}

export const QUOTE_CACHE_PREFIX = 'quotes';
