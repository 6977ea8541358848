/**
 * Q4 — Merge Configuration
 * ========================
 *
 * Default provider trust table and quality blend. Tencent ranks highest
 * (stable, carries industry data), Tushare lowest (token-gated, often
 * lagging).
 */

import { ALL_SOURCES, type DataSource } from '../contracts/quote.types.js';
import { clamp01 } from '../quote.record.js';
import type { MergeOptions, QualityBlend, ResolvedMergeOptions, SourceWeights } from './merge.types.js';

export const DEFAULT_SOURCE_WEIGHTS: Readonly<Record<DataSource, number>> = {
  tencent: 1.0,
  eastmoney: 0.9,
  akshare: 0.85,
  baostock: 0.75,
  sina: 0.7,
  joinquant: 0.7,
  tushare: 0.65,
};

export const DEFAULT_FALLBACK_WEIGHT = 0.5;

export const DEFAULT_QUALITY_BLEND: Readonly<QualityBlend> = {
  source: 0.4,
  completeness: 0.4,
  freshness: 0.2,
};

/** One A-share trading session: 09:30–11:30 + 13:00–15:00. */
export const TRADING_SESSION_MS = 4 * 60 * 60 * 1000;

function buildWeights(options: MergeOptions): Record<DataSource, number> {
  const fallback = clamp01(options.fallbackWeight ?? DEFAULT_FALLBACK_WEIGHT);
  const base: SourceWeights = options.sourceWeightTable ?? DEFAULT_SOURCE_WEIGHTS;
  const overrides: SourceWeights = options.sourceWeights ?? {};

  const weights = { ...DEFAULT_SOURCE_WEIGHTS };
  for (const source of ALL_SOURCES) {
    weights[source] = clamp01(overrides[source] ?? base[source] ?? fallback);
  }
  return weights;
}

export function resolveMergeOptions(options: MergeOptions = {}): ResolvedMergeOptions {
  return {
    weights: buildWeights(options),
    priority: options.priority ?? ALL_SOURCES,
    blend: { ...DEFAULT_QUALITY_BLEND, ...options.blend },
    stalenessHorizonMs: options.stalenessHorizonMs ?? TRADING_SESSION_MS,
  };
}
