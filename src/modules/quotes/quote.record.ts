/**
 * Q1 — Quote Record
 * =================
 *
 * Construction, scoring helpers and the structured / JSON forms of
 * QuoteRecord. Records are frozen; "changing" one means building a new one.
 */

import { z } from 'zod';
import { RecordValidationError, errorMessage } from '../../common/errors.js';
import {
  MARKETS,
  NUMERIC_FIELDS,
  QUOTE_FIELDS,
  SIGNED_FIELDS,
  isDataSource,
  type Board,
  type InstrumentFlags,
  type Market,
  type QuoteField,
  type QuoteFields,
  type QuoteRecord,
  type QuoteRecordInput,
  type StructuredQuote,
} from './contracts/quote.types.js';

const CODE_PATTERN = /^\d{6}$/;

// ═══════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════

function collectIssues(input: QuoteRecordInput): string[] {
  const issues: string[] = [];

  if (!input.code || !CODE_PATTERN.test(input.code)) {
    issues.push(`code must be a 6-digit string, got "${input.code}"`);
  }
  if (!isDataSource(input.source)) {
    issues.push(`unknown source "${input.source}"`);
  }
  if (!(input.fetchedAt instanceof Date) || Number.isNaN(input.fetchedAt.getTime())) {
    issues.push('fetchedAt must be a valid Date');
  }
  if (input.market !== undefined && !MARKETS.includes(input.market)) {
    issues.push(`unknown market "${input.market}"`);
  }

  for (const field of NUMERIC_FIELDS) {
    const value = input[field];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      issues.push(`${field} must be a finite number`);
      continue;
    }
    if (value < 0 && !SIGNED_FIELDS.includes(field)) {
      issues.push(`${field} must be non-negative, got ${value}`);
    }
  }

  if (input.volume !== undefined && !Number.isInteger(input.volume)) {
    issues.push(`volume must be an integer, got ${input.volume}`);
  }

  return issues;
}

function copyField<K extends QuoteField>(target: QuoteFields, input: QuoteFields, field: K): void {
  const value = input[field];
  if (value === undefined) return;
  if (typeof value === 'string' && value.trim() === '') return;
  target[field] = value;
}

/** Present schema fields only; blank strings count as absent. */
function pickFields(input: QuoteFields): QuoteFields {
  const fields: QuoteFields = {};
  for (const field of QUOTE_FIELDS) {
    copyField(fields, input, field);
  }
  return fields;
}

function build(input: QuoteRecordInput, qualityScore: number | null): QuoteRecord {
  const issues = collectIssues(input);
  if (issues.length > 0) {
    throw new RecordValidationError(`Invalid quote record: ${issues.join('; ')}`, issues);
  }

  const fields = pickFields(input);
  const base = {
    code: input.code,
    ...fields,
    source: input.source,
    fetchedAt: new Date(input.fetchedAt.getTime()),
  };

  return Object.freeze({
    ...base,
    qualityScore: clamp01(qualityScore ?? completeness(base)),
  });
}

/**
 * Build a record from normalizer output. The quality score starts at
 * the record's own completeness.
 */
export function createQuoteRecord(input: QuoteRecordInput): QuoteRecord {
  return build(input, null);
}

export function withQualityScore(record: QuoteRecord, score: number): QuoteRecord {
  return build(record, score);
}

// ═══════════════════════════════════════════════════════════════
// SCORING HELPERS
// ═══════════════════════════════════════════════════════════════

export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function hasField(record: QuoteFields, field: QuoteField): boolean {
  const value = record[field];
  if (value === undefined) return false;
  if (typeof value === 'string') return value.trim() !== '';
  return true;
}

/**
 * Share of schema fields that are present, in [0, 1].
 */
export function completeness(record: QuoteFields): number {
  const present = QUOTE_FIELDS.filter(f => hasField(record, f)).length;
  return present / QUOTE_FIELDS.length;
}

export function isValid(record: QuoteRecord): boolean {
  if (!record.code) return false;
  if (record.price === undefined || record.price < 0) return false;
  if (record.high !== undefined && record.low !== undefined && record.high < record.low) {
    return false;
  }
  return true;
}

// ═══════════════════════════════════════════════════════════════
// CLASSIFICATION
// ═══════════════════════════════════════════════════════════════

export function detectMarket(code: string): Market | undefined {
  if (code.startsWith('6')) return 'SH';
  if (code.startsWith('0') || code.startsWith('3')) return 'SZ';
  if (code.startsWith('8') || code.startsWith('4')) return 'BJ';
  return undefined;
}

export function detectBoard(code: string): Board {
  if (code.startsWith('688') || code.startsWith('689')) return 'STAR';
  if (code.startsWith('300') || code.startsWith('301')) return 'CHINEXT';
  if (code.startsWith('8') || code.startsWith('4')) return 'BSE';
  if (code.startsWith('6')) return 'SH_MAIN';
  return 'SZ_MAIN';
}

export function classifyInstrument(record: QuoteRecord): InstrumentFlags {
  const name = record.name ?? '';
  return {
    isSt: name.toUpperCase().includes('ST'),
    isChinext: record.code.startsWith('300') || record.code.startsWith('301'),
    isKcb: record.code.startsWith('688') || record.code.startsWith('689'),
    suspended: record.price === 0 && (record.volume ?? 0) === 0,
  };
}

// ═══════════════════════════════════════════════════════════════
// SERIALIZATION
// ═══════════════════════════════════════════════════════════════

export const dataSourceSchema = z.enum([
  'eastmoney',
  'tencent',
  'sina',
  'akshare',
  'baostock',
  'joinquant',
  'tushare',
]);

const optionalNumber = z.number().finite().optional();

const structuredQuoteSchema = z
  .object({
    code: z.string().regex(CODE_PATTERN),
    source: dataSourceSchema,
    fetchedAt: z.string().datetime({ offset: true }),
    qualityScore: z.number().min(0).max(1),

    name: z.string().optional(),
    market: z.enum(['SH', 'SZ', 'BJ']).optional(),
    board: z.string().optional(),
    sector: z.string().optional(),

    price: optionalNumber,
    open: optionalNumber,
    high: optionalNumber,
    low: optionalNumber,
    preClose: optionalNumber,
    changeAmount: optionalNumber,
    changePercent: optionalNumber,

    volume: z.number().int().optional(),
    amount: optionalNumber,
    turnoverRate: optionalNumber,
    marketCap: optionalNumber,
    totalCap: optionalNumber,
  })
  .strict();

export function toStructured(record: QuoteRecord): StructuredQuote {
  const out: StructuredQuote = {
    code: record.code,
    source: record.source,
    fetchedAt: record.fetchedAt.toISOString(),
    qualityScore: record.qualityScore,
  };
  Object.assign(out, pickFields(record));
  return out;
}

export function fromStructured(value: unknown): QuoteRecord {
  const parsed = structuredQuoteSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new RecordValidationError(`Invalid structured quote: ${issues.join('; ')}`, issues);
  }

  const { qualityScore, fetchedAt, ...rest } = parsed.data;
  return build({ ...rest, fetchedAt: new Date(fetchedAt) }, qualityScore);
}

export function toJson(record: QuoteRecord): string {
  return JSON.stringify(toStructured(record));
}

export function fromJson(text: string): QuoteRecord {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (err) {
    throw new RecordValidationError(`Quote JSON is not parseable: ${errorMessage(err)}`);
  }
  return fromStructured(value);
}
