/**
 * Q4 — Merge Contracts
 */

import type { DataSource, Market, QuoteRecord } from '../contracts/quote.types.js';

export interface MergeGroup {
  provider: DataSource;
  records: readonly QuoteRecord[];
}

export type SourceWeights = Partial<Record<DataSource, number>>;

export interface QualityBlend {
  source: number;
  completeness: number;
  freshness: number;
}

export interface MergeOptions {
  /** Entry-level overrides applied on top of the default table. */
  sourceWeights?: SourceWeights;
  /** Full replacement of the default table; providers not listed get the fallback. */
  sourceWeightTable?: SourceWeights;
  fallbackWeight?: number;
  /** Final tie-break order, earlier wins. */
  priority?: readonly DataSource[];
  blend?: Partial<QualityBlend>;
  /** Age at which freshness reaches 0. */
  stalenessHorizonMs?: number;
}

export interface ResolvedMergeOptions {
  weights: Record<DataSource, number>;
  priority: readonly DataSource[];
  blend: QualityBlend;
  stalenessHorizonMs: number;
}

export interface MergeStats {
  totalRecords: number;
  uniqueCodes: number;
  droppedInvalid: number;
  /** Codes seen in the input where no candidate passed validity. */
  invalidCodes: string[];
  /** Providers that supplied at least one field of the merged record. */
  contributors: Record<string, DataSource[]>;
  bySource: Partial<Record<DataSource, number>>;
  byMarket: Record<Market | 'UNKNOWN', number>;
  /** Merged records per board label as reported, 'UNKNOWN' when absent. */
  byBoard: Record<string, number>;
  averageQualityScore: number;
}

export interface MergeResult {
  quotes: Map<string, QuoteRecord>;
  stats: MergeStats;
}
