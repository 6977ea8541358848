/**
 * Q2 — AKShare Normalizer
 *
 * AKShare spot rows arrive re-keyed to the Sina layout.
 */

import type { DataSource } from '../contracts/quote.types.js';
import { BaseNormalizer, type FieldMap } from './base.normalizer.js';
import { SINA_FIELD_MAP } from './sina.normalizer.js';

export class AkShareNormalizer extends BaseNormalizer {
  readonly source: DataSource = 'akshare';
  protected readonly fieldMap: FieldMap = SINA_FIELD_MAP;
}
