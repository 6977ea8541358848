/**
 * Q2 — Base Quote Normalizer
 * ==========================
 *
 * Common machinery for provider normalizers:
 * - payload shape check
 * - code / name extraction
 * - tolerant numeric readers (absent, "", "-" → undefined)
 * - field-map driven mapping into QuoteFields
 *
 * Subclasses declare a source and a field map; a few override mapFields
 * where the provider ships extra structure.
 */

import { NormalizationError, RecordValidationError } from '../../../common/errors.js';
import type {
  DataSource,
  QuoteField,
  QuoteFields,
  QuoteRecord,
} from '../contracts/quote.types.js';
import { createQuoteRecord, detectBoard, detectMarket } from '../quote.record.js';

// ═══════════════════════════════════════════════════════════════
// CONTRACTS
// ═══════════════════════════════════════════════════════════════

export type RawPayload = Record<string, unknown>;

export interface NormalizeContext {
  fetchedAt?: Date;
}

export interface QuoteNormalizer {
  readonly source: DataSource;
  normalize(raw: unknown, context?: NormalizeContext): QuoteRecord;
}

export type NumericField = Exclude<QuoteField, 'name' | 'market' | 'board' | 'sector'>;

/** Payload keys per canonical field, tried in order. */
export type FieldMap = Partial<Record<NumericField | 'sector' | 'board', readonly string[]>>;

/** The conventional "fNN" layout most CN quote APIs share. */
export const EASTMONEY_FIELD_MAP: FieldMap = {
  price: ['f2'],
  changePercent: ['f3'],
  changeAmount: ['f4'],
  volume: ['f5'],
  amount: ['f6'],
  turnoverRate: ['f8'],
  high: ['f15'],
  low: ['f16'],
  open: ['f17'],
  preClose: ['f18'],
  marketCap: ['f20'],
  totalCap: ['f21'],
};

const CODE_KEYS = ['f12', 'code', 'symbol', 'secu_code'] as const;
const NAME_KEYS = ['f14', 'name', 'stock_name', '证券名称'] as const;
const EXCHANGE_PREFIX = /^(sh|sz|bj)/i;
const EXCHANGE_SUFFIX = /\.(sh|sz|bj|ss)$/i;

function isPayload(raw: unknown): raw is RawPayload {
  return typeof raw === 'object' && raw !== null && !Array.isArray(raw);
}

// ═══════════════════════════════════════════════════════════════
// BASE CLASS
// ═══════════════════════════════════════════════════════════════

/** "-0.00" reads as -0, which JSON writes as 0. */
function unsignedZero(value: number): number {
  return value === 0 ? 0 : value;
}

export abstract class BaseNormalizer implements QuoteNormalizer {
  abstract readonly source: DataSource;
  protected abstract readonly fieldMap: FieldMap;

  normalize(raw: unknown, context: NormalizeContext = {}): QuoteRecord {
    if (!isPayload(raw)) {
      throw new NormalizationError(this.source, 'payload must be an object');
    }

    const code = this.extractCode(raw);
    try {
      return createQuoteRecord({
        code,
        ...this.mapFields(raw, code),
        source: this.source,
        fetchedAt: context.fetchedAt ?? new Date(),
      });
    } catch (err) {
      if (err instanceof RecordValidationError) {
        throw new NormalizationError(this.source, err.message, { cause: err, code });
      }
      throw err;
    }
  }

  /**
   * Default mapping: field map for numerics and sector/board, code based
   * market and board detection.
   */
  protected mapFields(raw: RawPayload, code: string): QuoteFields {
    const fields: QuoteFields = {
      name: this.readString(raw, ...NAME_KEYS),
      market: detectMarket(code),
      board: this.readString(raw, ...(this.fieldMap.board ?? [])) ?? detectBoard(code),
      sector: this.readString(raw, ...(this.fieldMap.sector ?? [])),
    };

    fields.price = this.readMapped(raw, 'price');
    fields.open = this.readMapped(raw, 'open');
    fields.high = this.readMapped(raw, 'high');
    fields.low = this.readMapped(raw, 'low');
    fields.preClose = this.readMapped(raw, 'preClose');
    fields.changeAmount = this.readMapped(raw, 'changeAmount');
    fields.changePercent = this.readMapped(raw, 'changePercent');
    fields.volume = this.readInt(raw, ...(this.fieldMap.volume ?? []));
    fields.amount = this.readMapped(raw, 'amount');
    fields.turnoverRate = this.readMapped(raw, 'turnoverRate');
    fields.marketCap = this.readMapped(raw, 'marketCap');
    fields.totalCap = this.readMapped(raw, 'totalCap');

    return fields;
  }

  // ─────────────────────────────────────────────────────────────
  // IDENTITY
  // ─────────────────────────────────────────────────────────────

  protected extractCode(raw: RawPayload): string {
    let code = '';
    for (const key of CODE_KEYS) {
      const value = raw[key];
      if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
        code = String(value).padStart(6, '0');
        break;
      }
      if (typeof value === 'string' && value.trim()) {
        code = value.trim();
        break;
      }
    }

    if (!code) {
      throw new NormalizationError(this.source, 'instrument code is missing');
    }

    if (code.length > 6) {
      code = code.replace(EXCHANGE_PREFIX, '').replace(EXCHANGE_SUFFIX, '');
    }

    if (!/^\d{6}$/.test(code)) {
      throw new NormalizationError(this.source, `malformed instrument code "${code}"`, { code });
    }
    return code;
  }

  // ─────────────────────────────────────────────────────────────
  // READERS
  // ─────────────────────────────────────────────────────────────

  protected readMapped(raw: RawPayload, field: NumericField): number | undefined {
    return this.readFloat(raw, ...(this.fieldMap[field] ?? []));
  }

  protected readFloat(raw: RawPayload, ...keys: string[]): number | undefined {
    for (const key of keys) {
      const value = raw[key];
      if (typeof value === 'number') {
        if (Number.isFinite(value)) return unsignedZero(value);
        continue;
      }
      if (typeof value === 'string') {
        const trimmed = value.trim();
        if (trimmed === '' || trimmed === '-') continue;
        const parsed = Number(trimmed);
        if (Number.isFinite(parsed)) return unsignedZero(parsed);
      }
    }
    return undefined;
  }

  protected readInt(raw: RawPayload, ...keys: string[]): number | undefined {
    const value = this.readFloat(raw, ...keys);
    return value === undefined ? undefined : unsignedZero(Math.trunc(value));
  }

  protected readString(raw: RawPayload, ...keys: string[]): string | undefined {
    for (const key of keys) {
      const value = raw[key];
      if (typeof value === 'string' && value.trim()) return value.trim();
      if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    }
    return undefined;
  }
}
