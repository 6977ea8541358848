/**
 * Q8 — Quote Service Composition
 * ==============================
 *
 * Wires registry, provider pool, fetcher, cache backend and orchestrator
 * from one config object. The HTTP layer and server only see QuoteService.
 */

import { defaultLogger, type Clock, type Logger, type Sleep } from '../../common/host.deps.js';
import type { CacheBackend } from './cache/cache.types.js';
import { MemoryCacheBackend } from './cache/memory.cache.js';
import { MongoCacheBackend } from './cache/mongo.cache.js';
import type { DataSource } from './contracts/quote.types.js';
import type { ProviderEndpoints, QuoteFetcher } from './fetch/fetcher.types.js';
import { HttpQuoteFetcher } from './fetch/http.fetcher.js';
import { createDefaultRegistry, type NormalizerRegistry } from './normalizers/normalizer.registry.js';
import { DEFAULT_SOURCE_WEIGHTS } from './merge/merge.config.js';
import { ProviderPool } from './rotation/provider.pool.js';
import { RotatingOrchestrator } from './rotation/rotating.orchestrator.js';
import type { QuoteFetchOverrides } from './rotation/rotation.types.js';

export interface QuoteServiceConfig {
  providers: DataSource[];
  cacheBackend: 'memory' | 'mongo';
  mongoUrl?: string;
  endpoints: ProviderEndpoints;
  fetch: QuoteFetchOverrides;
}

export interface QuoteServiceDeps {
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleep;
  /** Replaces the backend chosen by config.cacheBackend. */
  cache?: CacheBackend;
  /** Replaces the HTTP fetcher. */
  fetcher?: QuoteFetcher;
  registry?: NormalizerRegistry;
}

export interface QuoteService {
  readonly registry: NormalizerRegistry;
  readonly pool: ProviderPool;
  readonly cache: CacheBackend;
  readonly orchestrator: RotatingOrchestrator;
  readonly logger: Logger;
  close(): Promise<void>;
}

export function createQuoteService(
  config: QuoteServiceConfig,
  deps: QuoteServiceDeps = {}
): QuoteService {
  const logger = deps.logger ?? defaultLogger;
  const registry = deps.registry ?? createDefaultRegistry(config.providers);

  const weights = { ...DEFAULT_SOURCE_WEIGHTS, ...config.fetch.sourceWeights };
  const pool = new ProviderPool(
    config.providers.map(id => ({ id, weight: weights[id] })),
    deps.clock
  );

  const cache =
    deps.cache ??
    (config.cacheBackend === 'mongo'
      ? MongoCacheBackend.fromConnection()
      : new MemoryCacheBackend({ defaultTtlMs: config.fetch.cacheTtlMs, clock: deps.clock }));

  const fetcher = deps.fetcher ?? new HttpQuoteFetcher({ endpoints: config.endpoints, logger });

  const orchestrator = new RotatingOrchestrator({
    pool,
    registry,
    fetcher,
    cache,
    config: config.fetch,
    logger,
    clock: deps.clock,
    sleep: deps.sleep,
  });

  logger.info(
    { providers: pool.ids(), cache: cache.name },
    `[QuoteService] ${pool.size} providers, ${cache.name} cache`
  );

  return {
    registry,
    pool,
    cache,
    orchestrator,
    logger,
    async close() {
      if (fetcher instanceof HttpQuoteFetcher) await fetcher.close();
    },
  };
}
