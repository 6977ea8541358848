/**
 * Q2 — Sina Normalizer
 *
 * Same fNN keys as EastMoney but shuffled for the OHLC block:
 * f4 is the high, f15 the open, f16 the low.
 */

import type { DataSource } from '../contracts/quote.types.js';
import { BaseNormalizer, type FieldMap } from './base.normalizer.js';

export const SINA_FIELD_MAP: FieldMap = {
  price: ['f2'],
  changePercent: ['f3'],
  high: ['f4'],
  volume: ['f5'],
  amount: ['f6'],
  turnoverRate: ['f8'],
  open: ['f15'],
  low: ['f16'],
  preClose: ['f18'],
};

export class SinaNormalizer extends BaseNormalizer {
  readonly source: DataSource = 'sina';
  protected readonly fieldMap: FieldMap = SINA_FIELD_MAP;
}
