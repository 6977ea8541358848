/**
 * Quotes Module Index
 */

export * from './contracts/quote.types.js';
export {
  createQuoteRecord,
  withQualityScore,
  clamp01,
  hasField,
  completeness,
  isValid,
  detectMarket,
  detectBoard,
  classifyInstrument,
  toStructured,
  fromStructured,
  toJson,
  fromJson,
} from './quote.record.js';

export * from './normalizers/index.js';
export { normalize, normalizeBatch } from './normalize.service.js';
export type { NormalizeOutcome } from './normalize.service.js';

export { MergeEngine, merge } from './merge/merge.engine.js';
export { DEFAULT_SOURCE_WEIGHTS, DEFAULT_QUALITY_BLEND, TRADING_SESSION_MS } from './merge/merge.config.js';
export type * from './merge/merge.types.js';

export type { CacheBackend, CachedQuoteEnvelope } from './cache/cache.types.js';
export { latestQuoteKey, providerQuoteKey } from './cache/cache.entry.js';
export { MemoryCacheBackend } from './cache/memory.cache.js';
export { MongoCacheBackend, QUOTE_CACHE_COLLECTION } from './cache/mongo.cache.js';

export type { QuoteFetcher, ProviderEndpoint, ProviderEndpoints } from './fetch/fetcher.types.js';
export { HttpQuoteFetcher } from './fetch/http.fetcher.js';

export { ProviderPool } from './rotation/provider.pool.js';
export {
  RotatingOrchestrator,
  DEFAULT_QUOTE_FETCH_CONFIG,
} from './rotation/rotating.orchestrator.js';
export type * from './rotation/rotation.types.js';

export { createQuoteService } from './quote.service.js';
export type { QuoteService, QuoteServiceConfig } from './quote.service.js';

export * from '../../common/errors.js';
