/**
 * HTTP API Tests
 *
 * Full Fastify app over app.inject with an in-process fetcher and the
 * memory cache.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../app.js';
import { FetchError } from '../common/errors.js';
import type { DataSource } from '../modules/quotes/contracts/quote.types.js';
import type { QuoteFetcher } from '../modules/quotes/fetch/fetcher.types.js';
import { createQuoteService } from '../modules/quotes/quote.service.js';

const ROWS: Record<string, Record<string, unknown>> = {
  '600000': { f12: '600000', f14: '浦发银行', f2: 10.5, f5: 120000 },
  '300750': { f12: '300750', f14: '宁德时代', f2: 180.2, f5: 45000 },
};

function fakeFetcher() {
  const fetch = vi.fn(async (provider: DataSource, code: string, _signal?: AbortSignal) => {
    const row = ROWS[code];
    if (provider !== 'eastmoney' || !row) {
      throw new FetchError(provider, 'HTTP 503', { status: 503 });
    }
    return row;
  });
  const fetcher: QuoteFetcher = { fetch };
  return { fetcher, fetch };
}

describe('quote API', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    const { fetcher } = fakeFetcher();
    app = buildApp({
      createService: logger =>
        createQuoteService(
          {
            providers: ['eastmoney', 'sina'],
            cacheBackend: 'memory',
            endpoints: {},
            fetch: { maxRetries: 0 },
          },
          { logger, fetcher, sleep: async () => undefined }
        ),
      logLevel: 'silent',
      nodeEnv: 'test',
    });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  // ═══════════════════════════════════════════════════════════════
  // HEALTH / ERRORS
  // ═══════════════════════════════════════════════════════════════

  it('should report health', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, cache: 'memory', providers: ['eastmoney', 'sina'] });
  });

  it('should answer unknown routes with NOT_FOUND', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/nothing-here' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });

  // ═══════════════════════════════════════════════════════════════
  // FETCH
  // ═══════════════════════════════════════════════════════════════

  it('should serve a live quote', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/quotes/600000' });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body).toMatchObject({
      ok: true,
      cached: false,
      provider: 'eastmoney',
      cachedAt: null,
      attempts: [{ provider: 'eastmoney', attempts: 1 }],
    });
    expect(body.quote).toMatchObject({
      code: '600000',
      name: '浦发银行',
      price: 10.5,
      volume: 120000,
      market: 'SH',
      source: 'eastmoney',
      flags: { isSt: false, isChinext: false, isKcb: false, suspended: false },
    });
    expect(typeof body.requestId).toBe('string');
  });

  it('should reject a malformed code', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/quotes/60000' });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      ok: false,
      error: 'VALIDATION_ERROR',
      message: '(body): must be a 6-digit instrument code',
    });
  });

  it('should answer 503 when no provider or cache entry can serve', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/quotes/000002' });
    expect(res.statusCode).toBe(503);
    expect(res.json()).toEqual({
      ok: false,
      error: 'ALL_SOURCES_EXHAUSTED',
      message: 'No provider or cache entry could serve 000002',
    });
  });

  it('should fetch a batch with per-code outcomes', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/quotes/batch',
      payload: { codes: ['600000', '000002', '300750'] },
    });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body).toMatchObject({ ok: true, count: 3, failed: 1 });
    expect(body.results.map((r: { code: string; ok: boolean }) => [r.code, r.ok])).toEqual([
      ['600000', true],
      ['000002', false],
      ['300750', true],
    ]);
    expect(body.results[1]).toEqual({
      code: '000002',
      ok: false,
      error: 'ALL_SOURCES_EXHAUSTED',
      message: 'No provider or cache entry could serve 000002',
    });
    expect(body.results[2].quote.flags.isChinext).toBe(true);
  });

  it('should validate batch bodies', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/quotes/batch', payload: { codes: [] } });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('VALIDATION_ERROR');
  });

  // ═══════════════════════════════════════════════════════════════
  // NORMALIZE / MERGE
  // ═══════════════════════════════════════════════════════════════

  it('should normalize a single payload', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/quotes/normalize',
      payload: { provider: 'sina', payload: { f12: 'sz000001', f2: 11.2, f4: 11.5, f16: 11.0 } },
    });
    expect(res.statusCode).toBe(200);
    expect(res.json().quote).toMatchObject({
      code: '000001',
      source: 'sina',
      price: 11.2,
      high: 11.5,
      low: 11,
      market: 'SZ',
    });
  });

  it('should normalize a batch and report rejected payloads', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/quotes/normalize',
      payload: { provider: 'eastmoney', payloads: [{ f12: '600000', f2: 1 }, { f2: 2 }] },
    });
    const body = res.json();
    expect(body).toMatchObject({ ok: true, count: 2, failed: 1 });
    expect(body.results[1]).toEqual({
      ok: false,
      error: 'NORMALIZATION_ERROR',
      message: '[eastmoney] instrument code is missing',
    });
  });

  it('should require exactly one of payload and payloads', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/quotes/normalize',
      payload: { provider: 'sina', payload: {}, payloads: [] },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('(body): exactly one of payload or payloads is required');
  });

  it('should refuse an unregistered provider', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/quotes/normalize',
      payload: { provider: 'tushare', payload: { code: '600000' } },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      ok: false,
      error: 'UNKNOWN_PROVIDER',
      message: 'Provider "tushare" is not registered (registered: eastmoney, sina)',
    });
  });

  it('should merge structured records', async () => {
    const fetchedAt = new Date().toISOString();
    const res = await app.inject({
      method: 'POST',
      url: '/api/quotes/merge',
      payload: {
        groups: [
          {
            provider: 'tencent',
            records: [{ code: '000001', source: 'tencent', fetchedAt, qualityScore: 0.1, price: 10.5 }],
          },
          {
            provider: 'eastmoney',
            records: [{ code: '000001', source: 'eastmoney', fetchedAt, qualityScore: 0.1, price: 10.6 }],
          },
        ],
        sourceWeights: { tencent: 0.9, eastmoney: 0.8 },
      },
    });
    expect(res.statusCode).toBe(200);

    const body = res.json();
    expect(body.quotes).toHaveLength(1);
    expect(body.quotes[0]).toMatchObject({ code: '000001', price: 10.5, source: 'tencent' });
    expect(body.stats).toMatchObject({ totalRecords: 2, uniqueCodes: 1, droppedInvalid: 0 });
  });

  it('should reject malformed structured records', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/api/quotes/merge',
      payload: { groups: [{ provider: 'sina', records: [{ code: '1' }] }] },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('RECORD_INVALID');
  });

  // ═══════════════════════════════════════════════════════════════
  // PROVIDERS
  // ═══════════════════════════════════════════════════════════════

  it('should report rotation state and reset a provider', async () => {
    await app.inject({ method: 'GET', url: '/api/quotes/000002' });

    const status = await app.inject({ method: 'GET', url: '/api/quotes/providers' });
    const body = status.json();
    expect(body.registered).toEqual(['eastmoney', 'sina']);
    expect(body.rotation.providers[0]).toMatchObject({
      id: 'eastmoney',
      status: 'DEGRADED',
      consecutiveFailures: 1,
      lastError: '[eastmoney] HTTP 503',
    });

    const reset = await app.inject({ method: 'POST', url: '/api/quotes/providers/eastmoney/reset' });
    expect(reset.statusCode).toBe(200);
    expect(reset.json().provider).toMatchObject({ id: 'eastmoney', status: 'UP', consecutiveFailures: 0 });
  });

  it('should 400 when resetting an unknown provider', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/quotes/providers/yahoo/reset' });
    expect(res.statusCode).toBe(400);
    expect(res.json().error).toBe('UNKNOWN_PROVIDER');
  });
});
