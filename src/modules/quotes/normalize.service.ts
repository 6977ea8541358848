/**
 * Q3 — Normalize Service
 * ======================
 *
 * Public entry points for turning raw provider payloads into records.
 * Batch normalization reports one outcome per payload, in input order.
 */

import { NormalizationError, errorMessage } from '../../common/errors.js';
import { defaultLogger, type Logger } from '../../common/host.deps.js';
import type { QuoteRecord } from './contracts/quote.types.js';
import type { NormalizeContext } from './normalizers/base.normalizer.js';
import type { NormalizerRegistry } from './normalizers/normalizer.registry.js';

export type NormalizeOutcome =
  | { ok: true; quote: QuoteRecord }
  | { ok: false; error: NormalizationError };

export function normalize(
  registry: NormalizerRegistry,
  provider: string,
  raw: unknown,
  context?: NormalizeContext
): QuoteRecord {
  return registry.resolve(provider).normalize(raw, context);
}

/**
 * Unknown provider is fatal for the whole call; anything else that goes
 * wrong with a single payload is captured as that payload's outcome.
 */
export function normalizeBatch(
  registry: NormalizerRegistry,
  provider: string,
  raws: readonly unknown[],
  options: { context?: NormalizeContext; logger?: Logger } = {}
): NormalizeOutcome[] {
  const normalizer = registry.resolve(provider);
  const logger = options.logger ?? defaultLogger;

  const outcomes = raws.map((raw, index): NormalizeOutcome => {
    try {
      return { ok: true, quote: normalizer.normalize(raw, options.context) };
    } catch (err) {
      const error =
        err instanceof NormalizationError
          ? err
          : new NormalizationError(provider, errorMessage(err), { cause: err });
      logger.debug({ provider, index, error: error.message }, '[Normalize] Payload rejected');
      return { ok: false, error };
    }
  });

  const failed = outcomes.filter(o => !o.ok).length;
  const summary = { provider, total: raws.length, ok: raws.length - failed, failed };
  if (failed > 0) {
    logger.warn(summary, '[Normalize] Batch finished with rejected payloads');
  } else {
    logger.info(summary, '[Normalize] Batch finished');
  }

  return outcomes;
}
