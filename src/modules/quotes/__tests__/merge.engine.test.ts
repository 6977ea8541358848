/**
 * Q4 — Merge Engine Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { Clock, Logger } from '../../../common/host.deps.js';
import type { QuoteRecord, QuoteRecordInput } from '../contracts/quote.types.js';
import { MergeEngine, merge } from '../merge/merge.engine.js';
import { createQuoteRecord, isValid } from '../quote.record.js';

const T0 = Date.parse('2024-03-01T02:00:00.000Z');

const createMockLogger = (): Logger => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
});

const fixedClock = (now: number): Clock => ({ now: () => now });

function quote(
  source: QuoteRecordInput['source'],
  fields: Omit<Partial<QuoteRecordInput>, 'source'> = {}
): QuoteRecord {
  return createQuoteRecord({
    code: '000001',
    fetchedAt: new Date(T0),
    ...fields,
    source,
  });
}

const deps = { clock: fixedClock(T0), logger: createMockLogger() };

// ═══════════════════════════════════════════════════════════════
// TESTS: Field selection
// ═══════════════════════════════════════════════════════════════

describe('merge field selection', () => {
  it('should take price from the provider with the higher weight', () => {
    const { quotes } = merge(
      [
        { provider: 'tencent', records: [quote('tencent', { price: 10.5 })] },
        { provider: 'eastmoney', records: [quote('eastmoney', { price: 10.6 })] },
      ],
      { sourceWeights: { tencent: 0.9, eastmoney: 0.8 } },
      deps
    );

    const merged = quotes.get('000001');
    expect(merged?.price).toBe(10.5);
    expect(merged?.source).toBe('tencent');
  });

  it('should fill gaps from lower-ranked candidates', () => {
    const { quotes, stats } = merge(
      [
        { provider: 'tencent', records: [quote('tencent', { price: 10.5, volume: 1000 })] },
        { provider: 'eastmoney', records: [quote('eastmoney', { price: 10.6, name: '平安银行' })] },
      ],
      {},
      deps
    );

    const merged = quotes.get('000001');
    expect(merged).toMatchObject({ price: 10.5, volume: 1000, name: '平安银行', source: 'tencent' });
    expect(merged?.open).toBeUndefined();
    expect(stats.contributors['000001']).toEqual(['tencent', 'eastmoney']);
  });

  it('should let completeness outweigh a small trust gap', () => {
    // eastmoney: 0.9 × 3/16 beats tencent: 1.0 × 1/16
    const { quotes } = merge(
      [
        { provider: 'tencent', records: [quote('tencent', { price: 10.5 })] },
        {
          provider: 'eastmoney',
          records: [quote('eastmoney', { price: 10.6, name: '平安银行', volume: 5 })],
        },
      ],
      {},
      deps
    );

    expect(quotes.get('000001')?.price).toBe(10.6);
    expect(quotes.get('000001')?.source).toBe('eastmoney');
  });

  it('should stamp the newest contributor fetch time', () => {
    const { quotes } = merge(
      [
        { provider: 'tencent', records: [quote('tencent', { price: 10.5, volume: 1000 })] },
        {
          provider: 'eastmoney',
          records: [
            quote('eastmoney', { price: 10.6, name: '平安银行', fetchedAt: new Date(T0 + 60_000) }),
          ],
        },
      ],
      {},
      { clock: fixedClock(T0 + 60_000), logger: createMockLogger() }
    );

    expect(quotes.get('000001')?.fetchedAt.getTime()).toBe(T0 + 60_000);
  });
});

describe('merge price range', () => {
  it('should take high and low from one candidate when picks contradict', () => {
    const { quotes, stats } = merge(
      [
        {
          provider: 'tencent',
          records: [quote('tencent', { price: 10, high: 9, volume: 100, name: '平安银行' })],
        },
        { provider: 'sina', records: [quote('sina', { price: 10, high: 12, low: 11 })] },
      ],
      {},
      deps
    );

    const merged = quotes.get('000001');
    expect(merged).toMatchObject({ price: 10, high: 12, low: 11, volume: 100, source: 'tencent' });
    expect(merged && isValid(merged)).toBe(true);
    expect(stats.contributors['000001']).toEqual(['tencent', 'sina']);
  });

  it('should drop the lower-ranked side when no candidate has both', () => {
    const { quotes, stats } = merge(
      [
        {
          provider: 'tencent',
          records: [quote('tencent', { price: 10, high: 9, volume: 100, name: '平安银行' })],
        },
        { provider: 'sina', records: [quote('sina', { price: 10, low: 11, volume: 5 })] },
      ],
      {},
      deps
    );

    const merged = quotes.get('000001');
    expect(merged?.high).toBe(9);
    expect(merged?.low).toBeUndefined();
    expect(stats.contributors['000001']).toEqual(['tencent']);
  });
});

// ═══════════════════════════════════════════════════════════════
// TESTS: Tie-breaks
// ═══════════════════════════════════════════════════════════════

describe('merge tie-breaks', () => {
  it('should prefer the newer record when weights are equal', () => {
    const { quotes } = merge(
      [
        { provider: 'sina', records: [quote('sina', { price: 1 })] },
        { provider: 'joinquant', records: [quote('joinquant', { price: 2, fetchedAt: new Date(T0 + 1000) })] },
      ],
      {},
      deps
    );
    expect(quotes.get('000001')?.price).toBe(2);
  });

  it('should fall back to provider priority, then input order', () => {
    const byPriority = merge(
      [
        { provider: 'joinquant', records: [quote('joinquant', { price: 2 })] },
        { provider: 'sina', records: [quote('sina', { price: 1 })] },
      ],
      {},
      deps
    );
    expect(byPriority.quotes.get('000001')?.price).toBe(1);

    const reordered = merge(
      [
        { provider: 'joinquant', records: [quote('joinquant', { price: 2 })] },
        { provider: 'sina', records: [quote('sina', { price: 1 })] },
      ],
      { priority: ['joinquant', 'sina'] },
      deps
    );
    expect(reordered.quotes.get('000001')?.price).toBe(2);

    const byInput = merge(
      [
        { provider: 'sina', records: [quote('sina', { price: 3 }), quote('sina', { price: 4 })] },
      ],
      {},
      deps
    );
    expect(byInput.quotes.get('000001')?.price).toBe(3);
  });
});

// ═══════════════════════════════════════════════════════════════
// TESTS: Quality score
// ═══════════════════════════════════════════════════════════════

describe('merge quality score', () => {
  const groups = [
    { provider: 'tencent' as const, records: [quote('tencent', { price: 10.5, volume: 1000 })] },
    { provider: 'eastmoney' as const, records: [quote('eastmoney', { price: 10.6, name: '平安银行' })] },
  ];

  it('should blend source factor, completeness and freshness', () => {
    // sourceFactor = (0.1125 + 0.125 + 0.125) / 3, completeness = 3/16, freshness = 1
    const { quotes } = merge(groups, {}, deps);
    expect(quotes.get('000001')?.qualityScore).toBeCloseTo(0.4 * (0.3625 / 3) + 0.4 * 0.1875 + 0.2, 10);
  });

  it('should decay freshness over the staleness horizon', () => {
    const halfway = merge(groups, {}, { clock: fixedClock(T0 + 2 * 60 * 60 * 1000), logger: createMockLogger() });
    expect(halfway.quotes.get('000001')?.qualityScore).toBeCloseTo(
      0.4 * (0.3625 / 3) + 0.4 * 0.1875 + 0.1,
      10
    );
  });

  it('should honour a custom blend', () => {
    const { quotes } = merge(groups, { blend: { source: 0, completeness: 1, freshness: 0 } }, deps);
    expect(quotes.get('000001')?.qualityScore).toBe(0.1875);
  });

  it('should give unlisted providers the fallback weight when the table is replaced', () => {
    const engine = new MergeEngine({ sourceWeightTable: { eastmoney: 1 } }, deps.clock, deps.logger);
    expect(engine.sourceWeight('eastmoney')).toBe(1);
    expect(engine.sourceWeight('tencent')).toBe(0.5);
  });
});

// ═══════════════════════════════════════════════════════════════
// TESTS: Buckets and stats
// ═══════════════════════════════════════════════════════════════

describe('merge stats', () => {
  it('should drop invalid candidates and report codes left without one', () => {
    const logger = createMockLogger();
    const { quotes, stats } = merge(
      [
        {
          provider: 'tencent',
          records: [
            quote('tencent', { code: '600000', price: 10, market: 'SH' }),
            quote('tencent', { code: '000001' }),
            quote('tencent', { code: '830799', price: 5, high: 4, low: 6 }),
          ],
        },
        { provider: 'sina', records: [quote('sina', { code: '600000', price: 10.1, market: 'SH' })] },
      ],
      {},
      { clock: fixedClock(T0), logger }
    );

    expect([...quotes.keys()]).toEqual(['600000']);
    expect(stats).toMatchObject({
      totalRecords: 4,
      uniqueCodes: 1,
      droppedInvalid: 2,
      invalidCodes: ['000001', '830799'],
      bySource: { tencent: 3, sina: 1 },
      byMarket: { SH: 1, SZ: 0, BJ: 0, UNKNOWN: 0 },
      byBoard: { UNKNOWN: 1 },
    });
    expect(stats.contributors['600000']).toEqual(['tencent']);
    expect(logger.info).toHaveBeenCalledWith(
      { totalRecords: 4, uniqueCodes: 1, droppedInvalid: 2 },
      '[Merge] 4 records -> 1 codes'
    );
  });

  it('should count merged records per board', () => {
    const { stats } = merge(
      [
        {
          provider: 'eastmoney',
          records: [
            quote('eastmoney', { code: '600000', price: 1, board: 'SH_MAIN' }),
            quote('eastmoney', { code: '300750', price: 1, board: 'CHINEXT' }),
            quote('eastmoney', { code: '300059', price: 1, board: 'CHINEXT' }),
            quote('eastmoney', { code: '000001', price: 1 }),
          ],
        },
      ],
      {},
      deps
    );
    expect(stats.byBoard).toEqual({ SH_MAIN: 1, CHINEXT: 2, UNKNOWN: 1 });
  });

  it('should emit codes in ascending order', () => {
    const { quotes } = merge(
      [
        {
          provider: 'sina',
          records: [
            quote('sina', { code: '600000', price: 1 }),
            quote('sina', { code: '000001', price: 1 }),
            quote('sina', { code: '300750', price: 1 }),
          ],
        },
      ],
      {},
      deps
    );
    expect([...quotes.keys()]).toEqual(['000001', '300750', '600000']);
  });

  it('should be deterministic and leave inputs untouched', () => {
    const tencent = quote('tencent', { price: 10.5 });
    const eastmoney = quote('eastmoney', { price: 10.6, name: '平安银行' });
    const groups = [
      { provider: 'tencent' as const, records: [tencent] },
      { provider: 'eastmoney' as const, records: [eastmoney] },
    ];

    const first = merge(groups, {}, deps);
    const second = merge(groups, {}, deps);

    expect([...second.quotes.entries()]).toEqual([...first.quotes.entries()]);
    expect(second.stats).toEqual(first.stats);
    expect(tencent.qualityScore).toBe(1 / 16);
    expect(first.quotes.get('000001')).not.toBe(tencent);
  });

  it('should return an empty result for no input', () => {
    const { quotes, stats } = merge([], {}, deps);
    expect(quotes.size).toBe(0);
    expect(stats.averageQualityScore).toBe(0);
    expect(stats.invalidCodes).toEqual([]);
  });
});
