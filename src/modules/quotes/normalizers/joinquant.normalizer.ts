/**
 * Q2 — JoinQuant Normalizer
 */

import type { DataSource } from '../contracts/quote.types.js';
import { BaseNormalizer, EASTMONEY_FIELD_MAP, type FieldMap } from './base.normalizer.js';

export class JoinQuantNormalizer extends BaseNormalizer {
  readonly source: DataSource = 'joinquant';
  protected readonly fieldMap: FieldMap = EASTMONEY_FIELD_MAP;
}
