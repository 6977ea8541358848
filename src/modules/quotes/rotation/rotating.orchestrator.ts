/**
 * Q6 — Rotating Orchestrator
 * ==========================
 *
 * Per request:
 *
 *   SELECT ──▶ ATTEMPT ──▶ NORMALIZE ──▶ SUCCESS (write-through cache)
 *     ▲           │  ▲          │
 *     │           ▼  │          │ malformed payload
 *     │       RETRY_SAME ◀──────┘
 *     │           │ retries exhausted
 *     └───────────┘
 *   pool exhausted / cooling down ──▶ CACHE_FALLBACK ──▶ FAILURE
 *
 * - every provider is visited at most once per request
 * - a rate-limited response skips the remaining retries
 * - the pool pointer moves once on entry and lands past the provider that
 *   answered
 * - cache calls are time-bounded; an unavailable cache never fails a request
 */

import Bottleneck from 'bottleneck';
import { v4 as uuidv4 } from 'uuid';
import {
  AllSourcesExhaustedError,
  AppError,
  BackendUnavailableError,
  FetchError,
  NormalizationError,
  RecordValidationError,
  RequestCancelledError,
  UnknownProviderError,
  errorMessage,
  type ProviderAttemptSummary,
} from '../../../common/errors.js';
import {
  defaultClock,
  defaultLogger,
  defaultSleep,
  type Clock,
  type Logger,
  type Sleep,
} from '../../../common/host.deps.js';
import { RequestCoalescer } from '../../../shared/runtime/request-coalescer.js';
import {
  decodeCachedQuote,
  encodeCachedQuote,
  latestQuoteKey,
  providerQuoteKey,
  withCacheTimeout,
  type CachedQuote,
} from '../cache/cache.entry.js';
import type { CacheBackend } from '../cache/cache.types.js';
import type { DataSource, QuoteRecord } from '../contracts/quote.types.js';
import type { QuoteFetcher } from '../fetch/fetcher.types.js';
import { MergeEngine } from '../merge/merge.engine.js';
import type { MergeGroup } from '../merge/merge.types.js';
import type { NormalizerRegistry } from '../normalizers/normalizer.registry.js';
import type { ProviderPool } from './provider.pool.js';
import type {
  BatchItemResult,
  BatchOptions,
  ProviderSlotStatus,
  QuoteFetchConfig,
  QuoteFetchOverrides,
  QuoteResult,
  RotationStatus,
} from './rotation.types.js';

// ═══════════════════════════════════════════════════════════════
// CONFIG
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_QUOTE_FETCH_CONFIG: Readonly<QuoteFetchConfig> = {
  maxRetries: 2,
  retryBackoffMs: 200,
  maxBackoffMs: 2000,
  failureThreshold: 3,
  cooldownDurationMs: 60_000,
  maxCacheStalenessMs: 15 * 60_000,
  cacheTtlMs: 30 * 60_000,
  cacheTimeoutMs: 250,
  batchConcurrency: 4,
  sourceWeights: {},
  mergeSources: false,
};

export function resolveFetchConfig(
  base: Readonly<QuoteFetchConfig>,
  overrides: QuoteFetchOverrides = {}
): QuoteFetchConfig {
  return {
    maxRetries: overrides.maxRetries ?? base.maxRetries,
    retryBackoffMs: overrides.retryBackoffMs ?? base.retryBackoffMs,
    maxBackoffMs: overrides.maxBackoffMs ?? base.maxBackoffMs,
    failureThreshold: overrides.failureThreshold ?? base.failureThreshold,
    cooldownDurationMs: overrides.cooldownDurationMs ?? base.cooldownDurationMs,
    maxCacheStalenessMs: overrides.maxCacheStalenessMs ?? base.maxCacheStalenessMs,
    cacheTtlMs: overrides.cacheTtlMs ?? base.cacheTtlMs,
    cacheTimeoutMs: overrides.cacheTimeoutMs ?? base.cacheTimeoutMs,
    batchConcurrency: overrides.batchConcurrency ?? base.batchConcurrency,
    sourceWeights: { ...base.sourceWeights, ...overrides.sourceWeights },
    mergeSources: overrides.mergeSources ?? base.mergeSources,
  };
}

/** Delay before retry number `retry` (1-based). */
export function backoffDelay(retry: number, config: QuoteFetchConfig): number {
  return Math.min(config.retryBackoffMs * 2 ** (retry - 1), config.maxBackoffMs);
}

const CODE_PATTERN = /^\d{6}$/;

function throwIfCancelled(code: string, signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new RequestCancelledError(code);
}

type ProviderOutcome =
  | { ok: true; quote: QuoteRecord; attempts: number }
  | { ok: false; attempts: number; lastError: string };

export interface RotatingOrchestratorDeps {
  pool: ProviderPool;
  registry: NormalizerRegistry;
  fetcher: QuoteFetcher;
  cache: CacheBackend;
  config?: QuoteFetchOverrides;
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleep;
  requestId?: () => string;
}

// ═══════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════

export class RotatingOrchestrator {
  private readonly pool: ProviderPool;
  private readonly registry: NormalizerRegistry;
  private readonly fetcher: QuoteFetcher;
  private readonly cache: CacheBackend;
  private readonly config: QuoteFetchConfig;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly newRequestId: () => string;
  private readonly coalescer = new RequestCoalescer<QuoteResult>();

  constructor(deps: RotatingOrchestratorDeps) {
    this.pool = deps.pool;
    this.registry = deps.registry;
    this.fetcher = deps.fetcher;
    this.cache = deps.cache;
    this.config = resolveFetchConfig(DEFAULT_QUOTE_FETCH_CONFIG, deps.config);
    this.logger = deps.logger ?? defaultLogger;
    this.clock = deps.clock ?? defaultClock;
    this.sleep = deps.sleep ?? defaultSleep;
    this.newRequestId = deps.requestId ?? uuidv4;
  }

  get settings(): Readonly<QuoteFetchConfig> {
    return this.config;
  }

  /**
   * Quote for one instrument. Calls without overrides or signal share an
   * in-flight request for the same code.
   */
  async fetchQuote(
    code: string,
    overrides?: QuoteFetchOverrides,
    options: BatchOptions = {}
  ): Promise<QuoteResult> {
    if (!CODE_PATTERN.test(code)) {
      throw new RecordValidationError(`Instrument code must be 6 digits, got "${code}"`);
    }

    if (overrides === undefined && options.signal === undefined) {
      return this.coalescer.run(code, () => this.execute(code, this.config));
    }
    return this.execute(code, resolveFetchConfig(this.config, overrides), options.signal);
  }

  /**
   * Quotes for several instruments, each through its own request cycle.
   * Results keep the order of first appearance in `codes`.
   */
  async fetchQuotesBatch(
    codes: readonly string[],
    overrides?: QuoteFetchOverrides,
    options: BatchOptions = {}
  ): Promise<Map<string, BatchItemResult>> {
    const { signal } = options;
    const config = resolveFetchConfig(this.config, overrides);
    const unique = [...new Set(codes)];
    const limiter = new Bottleneck({ maxConcurrent: Math.max(1, config.batchConcurrency) });

    const entries = await Promise.all(
      unique.map(code =>
        limiter.schedule(async (): Promise<[string, BatchItemResult]> => [
          code,
          await this.settle(code, overrides, signal),
        ])
      )
    );

    const results = new Map(entries);
    const failed = entries.filter(([, r]) => !r.ok).length;
    this.logger.info(
      { total: unique.length, ok: unique.length - failed, failed, cancelled: signal?.aborted ?? false },
      `[Rotation] Batch of ${unique.length} finished`
    );
    return results;
  }

  rotationStatus(): RotationStatus {
    return this.pool.status();
  }

  resetProvider(id: string): ProviderSlotStatus {
    const slot = this.pool.reset(id);
    this.logger.info({ provider: slot.id }, `[Rotation] ${slot.id} reset`);
    return this.pool.status().providers[slot.index];
  }

  // ─────────────────────────────────────────────────────────────
  // REQUEST CYCLE
  // ─────────────────────────────────────────────────────────────

  private async settle(
    code: string,
    overrides: QuoteFetchOverrides | undefined,
    signal: AbortSignal | undefined
  ): Promise<BatchItemResult> {
    if (signal?.aborted) {
      return { ok: false, error: new RequestCancelledError(code) };
    }
    try {
      return { ok: true, result: await this.fetchQuote(code, overrides, { signal }) };
    } catch (err) {
      const error =
        err instanceof Error
          ? err
          : new AppError('INTERNAL_ERROR', errorMessage(err), 500, { cause: err });
      return { ok: false, error };
    }
  }

  private async execute(
    code: string,
    config: QuoteFetchConfig,
    signal?: AbortSignal
  ): Promise<QuoteResult> {
    const requestId = this.newRequestId();
    const attempts: ProviderAttemptSummary[] = [];
    throwIfCancelled(code, signal);

    const reservation = this.pool.reserve();

    for (const index of this.pool.order(reservation.start)) {
      throwIfCancelled(code, signal);
      const provider = this.pool.slotAt(index).id;

      if (!this.pool.isEligible(index)) {
        attempts.push({ provider, attempts: 0, skipped: 'COOLDOWN' });
        continue;
      }

      const outcome = await this.tryProvider(provider, code, config, signal);

      if (outcome.ok) {
        this.pool.recordSuccess(index, reservation);
        attempts.push({ provider, attempts: outcome.attempts });

        const quote = config.mergeSources
          ? await this.mergeWithCached(outcome.quote, provider, config)
          : outcome.quote;
        await this.writeThrough(quote, outcome.quote, provider, config);

        this.logger.info(
          { requestId, code, provider, attempts: outcome.attempts },
          `[Rotation] ${code} served by ${provider}`
        );
        return { quote, cached: false, provider, attempts, requestId };
      }

      const cooledDown = this.pool.recordFailure(index, config, outcome.lastError);
      attempts.push({ provider, attempts: outcome.attempts, lastError: outcome.lastError });
      this.logger.warn(
        { requestId, code, provider, attempts: outcome.attempts, cooledDown },
        `[Rotation] ${provider} exhausted for ${code}, switching provider`
      );
    }

    const fallback = await this.readFallback(code, config);
    if (fallback) {
      this.logger.info(
        { requestId, code, cachedAt: fallback.cachedAt },
        `[Rotation] ${code} served from cache`
      );
      return {
        quote: fallback.quote,
        cached: true,
        provider: fallback.quote.source,
        cachedAt: new Date(fallback.cachedAt),
        attempts,
        requestId,
      };
    }

    this.logger.error({ requestId, code, attempts }, `[Rotation] All sources exhausted for ${code}`);
    throw new AllSourcesExhaustedError(code, attempts);
  }

  /**
   * Fetch + normalize against one provider with retries. A rate-limited
   * response ends the provider's turn at once. Only an unknown provider or
   * a cancellation escapes as an exception.
   */
  private async tryProvider(
    provider: DataSource,
    code: string,
    config: QuoteFetchConfig,
    signal: AbortSignal | undefined
  ): Promise<ProviderOutcome> {
    const normalizer = this.registry.resolve(provider);
    const maxAttempts = Math.max(0, config.maxRetries) + 1;
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfCancelled(code, signal);
      try {
        const raw = await this.fetcher.fetch(provider, code, signal);
        const quote = normalizer.normalize(raw, { fetchedAt: new Date(this.clock.now()) });
        if (quote.code !== code) {
          throw new NormalizationError(provider, `payload is for ${quote.code}, expected ${code}`, {
            code: quote.code,
          });
        }
        return { ok: true, quote, attempts: attempt };
      } catch (err) {
        if (err instanceof UnknownProviderError) throw err;
        throwIfCancelled(code, signal);
        lastError = errorMessage(err);
        this.logger.warn(
          { provider, code, attempt, error: lastError },
          `[Rotation] ${provider} attempt ${attempt}/${maxAttempts} failed`
        );
        // A throttled provider gets no retries.
        if (err instanceof FetchError && err.rateLimited) {
          return { ok: false, attempts: attempt, lastError };
        }
      }

      if (attempt < maxAttempts) {
        await this.backoff(attempt, code, config, signal);
      }
    }

    return { ok: false, attempts: maxAttempts, lastError };
  }

  private async backoff(
    retry: number,
    code: string,
    config: QuoteFetchConfig,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const delay = backoffDelay(retry, config);
    if (delay <= 0) return;
    try {
      await this.sleep(delay, signal);
    } catch (err) {
      if (signal?.aborted) throw new RequestCancelledError(code);
      throw err;
    }
  }

  // ─────────────────────────────────────────────────────────────
  // MERGE
  // ─────────────────────────────────────────────────────────────

  /**
   * Merge the live record with fresh provider-scoped cache entries of the
   * other pool members.
   */
  private async mergeWithCached(
    live: QuoteRecord,
    provider: DataSource,
    config: QuoteFetchConfig
  ): Promise<QuoteRecord> {
    const groups: MergeGroup[] = [{ provider, records: [live] }];
    const now = this.clock.now();

    for (const other of this.pool.ids()) {
      if (other === provider) continue;
      const entry = await this.cacheGet(providerQuoteKey(live.code, other), config);
      if (!entry || now - entry.cachedAt > config.maxCacheStalenessMs) continue;
      groups.push({ provider: other, records: [entry.quote] });
    }

    if (groups.length === 1) return live;

    const engine = new MergeEngine(
      { sourceWeights: { ...this.pool.weights(), ...config.sourceWeights } },
      this.clock,
      this.logger
    );
    return engine.merge(groups).quotes.get(live.code) ?? live;
  }

  // ─────────────────────────────────────────────────────────────
  // CACHE
  // ─────────────────────────────────────────────────────────────

  private async writeThrough(
    quote: QuoteRecord,
    live: QuoteRecord,
    provider: DataSource,
    config: QuoteFetchConfig
  ): Promise<void> {
    const cachedAt = this.clock.now();
    await this.cacheSet(providerQuoteKey(live.code, provider), encodeCachedQuote(live, cachedAt), config);
    await this.cacheSet(latestQuoteKey(quote.code), encodeCachedQuote(quote, cachedAt), config);
  }

  private async readFallback(code: string, config: QuoteFetchConfig): Promise<CachedQuote | undefined> {
    const entry = await this.cacheGet(latestQuoteKey(code), config);
    if (!entry) return undefined;

    const age = this.clock.now() - entry.cachedAt;
    if (age > config.maxCacheStalenessMs) {
      this.logger.debug({ code, ageMs: age }, `[Rotation] Cached ${code} too stale`);
      return undefined;
    }
    return entry;
  }

  private async cacheSet(key: string, value: string, config: QuoteFetchConfig): Promise<void> {
    try {
      await withCacheTimeout(this.cache.name, 'set', config.cacheTimeoutMs, () =>
        this.cache.set(key, value, config.cacheTtlMs)
      );
    } catch (err) {
      if (!(err instanceof BackendUnavailableError)) throw err;
      this.logger.warn({ key, error: err.message }, '[Rotation] Cache write skipped');
    }
  }

  private async cacheGet(key: string, config: QuoteFetchConfig): Promise<CachedQuote | undefined> {
    let text: string | undefined;
    try {
      text = await withCacheTimeout(this.cache.name, 'get', config.cacheTimeoutMs, () =>
        this.cache.get(key)
      );
    } catch (err) {
      if (!(err instanceof BackendUnavailableError)) throw err;
      this.logger.warn({ key, error: err.message }, '[Rotation] Cache read skipped');
      return undefined;
    }

    if (text === undefined) return undefined;
    try {
      return decodeCachedQuote(text);
    } catch (err) {
      this.logger.warn({ key, error: errorMessage(err) }, '[Rotation] Unreadable cache entry ignored');
      return undefined;
    }
  }
}
