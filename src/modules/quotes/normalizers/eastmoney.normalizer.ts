/**
 * Q2 — EastMoney Normalizer
 *
 * Raw rows use the fNN layout: f12 code, f14 name, f2 price, f3 change %,
 * f4 change, f5 volume, f6 amount, f8 turnover, f15/f16 high/low,
 * f17 open, f18 previous close, f20/f21 float/total cap.
 */

import type { DataSource } from '../contracts/quote.types.js';
import { BaseNormalizer, EASTMONEY_FIELD_MAP, type FieldMap } from './base.normalizer.js';

export class EastMoneyNormalizer extends BaseNormalizer {
  readonly source: DataSource = 'eastmoney';
  protected readonly fieldMap: FieldMap = EASTMONEY_FIELD_MAP;
}
