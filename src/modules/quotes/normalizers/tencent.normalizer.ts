/**
 * Q2 — Tencent Normalizer
 *
 * Tencent rows come either in the fNN layout or already re-keyed with
 * readable names, and may carry market, board and industry.
 */

import type { DataSource, Market, QuoteFields } from '../contracts/quote.types.js';
import { detectMarket } from '../quote.record.js';
import { BaseNormalizer, type FieldMap, type RawPayload } from './base.normalizer.js';

const TENCENT_FIELD_MAP: FieldMap = {
  price: ['f2', 'price'],
  changePercent: ['f3', 'change_percent'],
  changeAmount: ['f4', 'change_amount'],
  volume: ['f5', 'volume'],
  amount: ['f6', 'amount'],
  turnoverRate: ['f8', 'turnover_rate'],
  high: ['f15', 'high'],
  low: ['f16', 'low'],
  open: ['f17', 'open'],
  preClose: ['f18', 'pre_close'],
  marketCap: ['f20', 'market_cap'],
  totalCap: ['f21', 'total_cap'],
  board: ['market_board', 'board'],
  sector: ['sector', 'industry'],
};

export class TencentNormalizer extends BaseNormalizer {
  readonly source: DataSource = 'tencent';
  protected readonly fieldMap: FieldMap = TENCENT_FIELD_MAP;

  protected mapFields(raw: RawPayload, code: string): QuoteFields {
    return {
      ...super.mapFields(raw, code),
      market: this.readMarket(raw) ?? detectMarket(code),
    };
  }

  /** "0" is Shenzhen, any other digit Shanghai; exchange codes pass through. */
  private readMarket(raw: RawPayload): Market | undefined {
    const value = this.readString(raw, 'market');
    if (!value) return undefined;

    const upper = value.toUpperCase();
    if (upper === 'SH' || upper === 'SZ' || upper === 'BJ') return upper;
    if (/^\d+$/.test(value)) return Number(value) === 0 ? 'SZ' : 'SH';
    return undefined;
  }
}
