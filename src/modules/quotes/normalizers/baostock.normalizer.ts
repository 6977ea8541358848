/**
 * Q2 — BaoStock Normalizer
 *
 * Rows are pre-flattened into the fNN layout upstream.
 */

import type { DataSource } from '../contracts/quote.types.js';
import { BaseNormalizer, EASTMONEY_FIELD_MAP, type FieldMap } from './base.normalizer.js';

export class BaoStockNormalizer extends BaseNormalizer {
  readonly source: DataSource = 'baostock';
  protected readonly fieldMap: FieldMap = EASTMONEY_FIELD_MAP;
}
