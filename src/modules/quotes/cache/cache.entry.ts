/**
 * Q5 — Cache Entries
 * ==================
 *
 * Key layout, envelope encoding and the time bound applied to every
 * backend call.
 */

import { z } from 'zod';
import { BackendUnavailableError } from '../../../common/errors.js';
import type { DataSource, QuoteRecord } from '../contracts/quote.types.js';
import { fromStructured, toStructured } from '../quote.record.js';
import { QUOTE_CACHE_PREFIX, type CachedQuoteEnvelope } from './cache.types.js';

// ═══════════════════════════════════════════════════════════════
// KEYS
// ═══════════════════════════════════════════════════════════════

/** Latest quote from any provider. */
export function latestQuoteKey(code: string): string {
  return `${QUOTE_CACHE_PREFIX}:quote:${code}`;
}

/** Provider-scoped quote. */
export function providerQuoteKey(code: string, provider: DataSource): string {
  return `${QUOTE_CACHE_PREFIX}:quote:${code}:${provider}`;
}

// ═══════════════════════════════════════════════════════════════
// ENVELOPE
// ═══════════════════════════════════════════════════════════════

const envelopeSchema = z.object({
  quote: z.unknown(),
  cachedAt: z.number().finite(),
});

export interface CachedQuote {
  quote: QuoteRecord;
  cachedAt: number;
}

export function encodeCachedQuote(quote: QuoteRecord, cachedAt: number): string {
  const envelope: CachedQuoteEnvelope = { quote: toStructured(quote), cachedAt };
  return JSON.stringify(envelope);
}

/**
 * Decode a stored envelope. Throws when the text is not a quote envelope;
 * callers treat that as a miss.
 */
export function decodeCachedQuote(text: string): CachedQuote {
  const parsed = envelopeSchema.parse(JSON.parse(text));
  return {
    quote: fromStructured(parsed.quote),
    cachedAt: parsed.cachedAt,
  };
}

// ═══════════════════════════════════════════════════════════════
// TIME BOUND
// ═══════════════════════════════════════════════════════════════

/**
 * Race a backend call against a timer. A timeout surfaces as
 * BackendUnavailableError; errors raised by the backend itself pass
 * through unchanged, already classified by the backend.
 */
export async function withCacheTimeout<T>(
  backend: string,
  operation: string,
  timeoutMs: number,
  call: () => Promise<T>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new BackendUnavailableError(`${backend} ${operation} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
