/**
 * Q7 — HTTP Quote Fetcher
 * =======================
 *
 * axios client + one Bottleneck limiter per provider.
 *
 * Placeholders in urlTemplate:
 *   {code}    600000
 *   {market}  sh | sz | bj
 *   {secid}   1.600000 (SH) / 0.000001 (SZ, BJ)
 */

import axios, { type AxiosInstance } from 'axios';
import Bottleneck from 'bottleneck';
import { FetchError, errorMessage } from '../../../common/errors.js';
import { defaultLogger, type Logger } from '../../../common/host.deps.js';
import type { DataSource } from '../contracts/quote.types.js';
import { detectMarket } from '../quote.record.js';
import type {
  ProviderEndpoint,
  ProviderEndpoints,
  QuoteFetcher,
  RateLimitConfig,
} from './fetcher.types.js';

// Provider-specific safe limits
export const RATE_LIMITS: Partial<Record<DataSource, RateLimitConfig>> = {
  eastmoney: { minTime: 200, maxConcurrent: 3 },
  tencent: { minTime: 200, maxConcurrent: 3 },
  sina: { minTime: 300, maxConcurrent: 2 },
  tushare: { minTime: 500, maxConcurrent: 1 },
};

export const DEFAULT_RATE_LIMIT: RateLimitConfig = { minTime: 300, maxConcurrent: 1 };

const DEFAULT_TIMEOUT_MS = 5000;

export interface HttpQuoteFetcherOptions {
  endpoints: ProviderEndpoints;
  client?: AxiosInstance;
  timeoutMs?: number;
  rateLimits?: Partial<Record<DataSource, RateLimitConfig>>;
  defaultRateLimit?: RateLimitConfig;
  logger?: Logger;
}

// ═══════════════════════════════════════════════════════════════
// URL / PAYLOAD HELPERS
// ═══════════════════════════════════════════════════════════════

export function buildQuoteUrl(template: string, code: string): string {
  const market = detectMarket(code) ?? 'SZ';
  const secid = `${market === 'SH' ? 1 : 0}.${code}`;
  return template
    .replaceAll('{code}', encodeURIComponent(code))
    .replaceAll('{market}', market.toLowerCase())
    .replaceAll('{secid}', secid);
}

export function extractPath(body: unknown, path: string | undefined): unknown {
  if (!path) return body;

  let current: unknown = body;
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      current = current[Number(segment)];
    } else if (typeof current === 'object' && current !== null) {
      current = Object.getOwnPropertyDescriptor(current, segment)?.value;
    } else {
      return undefined;
    }
  }
  return current;
}

// ═══════════════════════════════════════════════════════════════
// FETCHER
// ═══════════════════════════════════════════════════════════════

export class HttpQuoteFetcher implements QuoteFetcher {
  private readonly client: AxiosInstance;
  private readonly limiters = new Map<DataSource, Bottleneck>();
  private readonly logger: Logger;

  constructor(private readonly options: HttpQuoteFetcherOptions) {
    this.client =
      options.client ??
      axios.create({
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        headers: { 'User-Agent': 'Mozilla/5.0 (compatible; QuoteHub/1.0)' },
      });
    this.logger = options.logger ?? defaultLogger;
  }

  async fetch(provider: DataSource, code: string, signal?: AbortSignal): Promise<unknown> {
    const endpoint = this.endpointFor(provider);
    const url = buildQuoteUrl(endpoint.urlTemplate, code);

    let body: unknown;
    try {
      const response = await this.limiterFor(provider).schedule(() =>
        this.client.get<unknown>(url, { signal })
      );
      body = response.data;
    } catch (err) {
      throw this.toFetchError(provider, err);
    }

    const payload = extractPath(body, endpoint.dataPath);
    if (payload === undefined || payload === null) {
      throw new FetchError(provider, `empty payload for ${code}`);
    }
    return payload;
  }

  /** Drop queued jobs and release limiter timers. */
  async close(): Promise<void> {
    await Promise.all([...this.limiters.values()].map(l => l.stop({ dropWaitingJobs: true })));
    this.limiters.clear();
  }

  private endpointFor(provider: DataSource): ProviderEndpoint {
    const endpoint = this.options.endpoints[provider];
    if (!endpoint) {
      throw new FetchError(provider, 'no endpoint configured');
    }
    return endpoint;
  }

  private limiterFor(provider: DataSource): Bottleneck {
    const existing = this.limiters.get(provider);
    if (existing) return existing;

    const config =
      this.options.rateLimits?.[provider] ??
      RATE_LIMITS[provider] ??
      this.options.defaultRateLimit ??
      DEFAULT_RATE_LIMIT;

    const limiter = new Bottleneck({
      minTime: config.minTime,
      maxConcurrent: config.maxConcurrent,
    });
    this.limiters.set(provider, limiter);
    return limiter;
  }

  private toFetchError(provider: DataSource, err: unknown): FetchError {
    if (axios.isAxiosError(err)) {
      const status = err.response?.status;
      const rateLimited = status === 429;
      if (rateLimited) {
        this.logger.warn({ provider, status }, `[Fetch] ${provider} rate limited`);
      }
      return new FetchError(provider, status ? `HTTP ${status}` : err.message, {
        cause: err,
        status,
        rateLimited,
      });
    }
    return new FetchError(provider, errorMessage(err), { cause: err });
  }
}
