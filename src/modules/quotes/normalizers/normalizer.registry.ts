/**
 * Q2 — Normalizer Registry
 * ========================
 *
 * Maps a provider id to its normalizer. Built once at startup and only
 * read afterwards; an instance per process (or per test) instead of
 * module-level state.
 */

import { UnknownProviderError } from '../../../common/errors.js';
import { ALL_SOURCES, type DataSource } from '../contracts/quote.types.js';
import type { QuoteNormalizer } from './base.normalizer.js';
import { AkShareNormalizer } from './akshare.normalizer.js';
import { BaoStockNormalizer } from './baostock.normalizer.js';
import { EastMoneyNormalizer } from './eastmoney.normalizer.js';
import { JoinQuantNormalizer } from './joinquant.normalizer.js';
import { SinaNormalizer } from './sina.normalizer.js';
import { TencentNormalizer } from './tencent.normalizer.js';
import { TushareNormalizer } from './tushare.normalizer.js';

export class NormalizerRegistry {
  private readonly normalizers = new Map<string, QuoteNormalizer>();

  register(source: DataSource, normalizer: QuoteNormalizer): this {
    if (normalizer.source !== source) {
      throw new Error(
        `[NormalizerRegistry] ${normalizer.source} normalizer cannot be registered as ${source}`
      );
    }
    this.normalizers.set(source, normalizer);
    return this;
  }

  /**
   * Accepts any string so ids coming from config or HTTP can be resolved
   * without a prior type check.
   */
  resolve(source: string): QuoteNormalizer {
    const normalizer = this.normalizers.get(source);
    if (!normalizer) {
      throw new UnknownProviderError(source, this.sources());
    }
    return normalizer;
  }

  has(source: string): boolean {
    return this.normalizers.has(source);
  }

  /** Registered sources in default priority order. */
  sources(): DataSource[] {
    return ALL_SOURCES.filter(s => this.normalizers.has(s));
  }
}

const BUILDERS: Record<DataSource, () => QuoteNormalizer> = {
  eastmoney: () => new EastMoneyNormalizer(),
  tencent: () => new TencentNormalizer(),
  sina: () => new SinaNormalizer(),
  akshare: () => new AkShareNormalizer(),
  baostock: () => new BaoStockNormalizer(),
  joinquant: () => new JoinQuantNormalizer(),
  tushare: () => new TushareNormalizer(),
};

/**
 * Registry with every built-in provider (or the given subset).
 */
export function createDefaultRegistry(
  sources: readonly DataSource[] = ALL_SOURCES
): NormalizerRegistry {
  const registry = new NormalizerRegistry();
  for (const source of sources) {
    registry.register(source, BUILDERS[source]());
  }
  return registry;
}
