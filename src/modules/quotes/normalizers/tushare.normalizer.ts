/**
 * Q2 — Tushare Normalizer
 *
 * Tushare daily rows use their own column names (close, pct_chg, vol,
 * circ_mv, total_mv); fNN keys are accepted too for pre-mapped rows.
 */

import type { DataSource } from '../contracts/quote.types.js';
import { BaseNormalizer, type FieldMap } from './base.normalizer.js';

const TUSHARE_FIELD_MAP: FieldMap = {
  price: ['f2', 'close', 'price'],
  changePercent: ['f3', 'pct_chg'],
  changeAmount: ['f4', 'change'],
  volume: ['f5', 'vol', 'volume'],
  amount: ['f6', 'amount'],
  turnoverRate: ['f8', 'turnover_rate'],
  high: ['f15', 'high'],
  low: ['f16', 'low'],
  open: ['f17', 'open'],
  preClose: ['f18', 'pre_close'],
  marketCap: ['f20', 'circ_mv'],
  totalCap: ['f21', 'total_mv'],
  sector: ['industry', 'sector'],
};

export class TushareNormalizer extends BaseNormalizer {
  readonly source: DataSource = 'tushare';
  protected readonly fieldMap: FieldMap = TUSHARE_FIELD_MAP;
}
