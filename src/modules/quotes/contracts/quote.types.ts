/**
 * Q1 — Quote Contracts
 * ====================
 *
 * Canonical quote shape shared by every provider.
 *
 * INVARIANTS:
 * - code is a 6-digit instrument code, never empty
 * - absent numeric fields are undefined, never 0
 * - qualityScore is derived, never supplied by a normalizer
 */

// ═══════════════════════════════════════════════════════════════
// PROVIDER IDENTIFICATION
// ═══════════════════════════════════════════════════════════════

export type DataSource =
  | 'eastmoney'
  | 'tencent'
  | 'sina'
  | 'akshare'
  | 'baostock'
  | 'joinquant'
  | 'tushare';

/** Default priority order (most trusted first). */
export const ALL_SOURCES: readonly DataSource[] = [
  'tencent',
  'eastmoney',
  'akshare',
  'baostock',
  'sina',
  'joinquant',
  'tushare',
];

export function isDataSource(value: string): value is DataSource {
  return ALL_SOURCES.some(source => source === value);
}

export type Market = 'SH' | 'SZ' | 'BJ';

export const MARKETS: readonly Market[] = ['SH', 'SZ', 'BJ'];

export type Board = 'STAR' | 'CHINEXT' | 'BSE' | 'SH_MAIN' | 'SZ_MAIN';

// ═══════════════════════════════════════════════════════════════
// QUOTE RECORD
// ═══════════════════════════════════════════════════════════════

export interface QuoteFields {
  name?: string;
  market?: Market;
  board?: string;
  sector?: string;

  price?: number;
  open?: number;
  high?: number;
  low?: number;
  preClose?: number;
  changeAmount?: number;
  changePercent?: number;

  volume?: number;        // shares (lots), integer
  amount?: number;        // turnover in currency
  turnoverRate?: number;  // %
  marketCap?: number;     // float cap
  totalCap?: number;
}

export type QuoteField = keyof QuoteFields;

export interface QuoteRecord extends Readonly<QuoteFields> {
  readonly code: string;
  readonly source: DataSource;
  readonly fetchedAt: Date;
  readonly qualityScore: number;
}

/** What a normalizer hands to createQuoteRecord. */
export interface QuoteRecordInput extends QuoteFields {
  code: string;
  source: DataSource;
  fetchedAt: Date;
}

/** Every field counted by completeness and considered by the merge engine. */
export const QUOTE_FIELDS: readonly QuoteField[] = [
  'name',
  'market',
  'board',
  'sector',
  'price',
  'open',
  'high',
  'low',
  'preClose',
  'changeAmount',
  'changePercent',
  'volume',
  'amount',
  'turnoverRate',
  'marketCap',
  'totalCap',
];

export const STRING_FIELDS: readonly QuoteField[] = ['name', 'board', 'sector'];

export const SIGNED_FIELDS: readonly QuoteField[] = ['changeAmount', 'changePercent'];

export const NUMERIC_FIELDS: readonly QuoteField[] = QUOTE_FIELDS.filter(
  f => f !== 'market' && !STRING_FIELDS.includes(f)
);

// ═══════════════════════════════════════════════════════════════
// SERIALIZED FORM
// ═══════════════════════════════════════════════════════════════

export interface StructuredQuote extends QuoteFields {
  code: string;
  source: DataSource;
  fetchedAt: string;  // ISO-8601
  qualityScore: number;
}

export interface InstrumentFlags {
  isSt: boolean;
  isChinext: boolean;
  isKcb: boolean;
  suspended: boolean;
}
