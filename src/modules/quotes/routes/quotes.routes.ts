/**
 * Q9 — Quote Routes
 * =================
 *
 * GET  /api/quotes/:code
 * POST /api/quotes/batch
 * POST /api/quotes/normalize
 * POST /api/quotes/merge
 * GET  /api/quotes/providers
 * POST /api/quotes/providers/:id/reset
 *
 * Bodies are checked with zod; a failed check is a 400 VALIDATION_ERROR.
 * Everything else that goes wrong is an AppError handled by app.ts.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { AppError } from '../../../common/errors.js';
import type { QuoteRecord } from '../contracts/quote.types.js';
import { MergeEngine } from '../merge/merge.engine.js';
import { normalize, normalizeBatch } from '../normalize.service.js';
import { classifyInstrument, dataSourceSchema, fromStructured, toStructured } from '../quote.record.js';
import type { QuoteService } from '../quote.service.js';
import type { BatchItemResult, QuoteResult } from '../rotation/rotation.types.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const codeSchema = z.string().regex(/^\d{6}$/, 'must be a 6-digit instrument code');

const weightsSchema = z.record(dataSourceSchema, z.number().min(0).max(1));

const overridesSchema = z
  .object({
    maxRetries: z.number().int().min(0).max(10).optional(),
    cooldownDurationMs: z.number().int().min(0).optional(),
    maxCacheStalenessMs: z.number().int().min(0).optional(),
    sourceWeights: weightsSchema.optional(),
    mergeSources: z.boolean().optional(),
  })
  .strict();

const quoteQuerySchema = z.object({
  merge: z.enum(['true', 'false']).optional(),
});

const batchBodySchema = z.object({
  codes: z.array(codeSchema).min(1).max(200),
  overrides: overridesSchema.optional(),
});

const normalizeBodySchema = z
  .object({
    provider: z.string().min(1),
    payload: z.unknown().optional(),
    payloads: z.array(z.unknown()).optional(),
  })
  .refine(b => (b.payload === undefined) !== (b.payloads === undefined), {
    message: 'exactly one of payload or payloads is required',
  });

const mergeBodySchema = z.object({
  groups: z
    .array(
      z.object({
        provider: dataSourceSchema,
        records: z.array(z.unknown()),
      })
    )
    .min(1),
  sourceWeights: weightsSchema.optional(),
});

function parse<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues
      .map(i => `${i.path.join('.') || '(body)'}: ${i.message}`)
      .join('; ');
    throw new AppError('VALIDATION_ERROR', message, 400);
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════
// SERIALIZATION
// ═══════════════════════════════════════════════════════════════

function quoteView(quote: QuoteRecord) {
  return { ...toStructured(quote), flags: classifyInstrument(quote) };
}

function resultView(result: QuoteResult) {
  return {
    quote: quoteView(result.quote),
    cached: result.cached,
    provider: result.provider,
    cachedAt: result.cachedAt ? result.cachedAt.toISOString() : null,
    attempts: result.attempts,
    requestId: result.requestId,
  };
}

function batchItemView(code: string, item: BatchItemResult) {
  if (item.ok) return { code, ok: true, ...resultView(item.result) };
  const error = item.error instanceof AppError ? item.error.code : 'INTERNAL_ERROR';
  return { code, ok: false, error, message: item.error.message };
}

// ═══════════════════════════════════════════════════════════════
// ROUTE REGISTRATION
// ═══════════════════════════════════════════════════════════════

export async function registerQuoteRoutes(app: FastifyInstance, service: QuoteService): Promise<void> {
  const prefix = '/api/quotes';
  const { orchestrator, registry } = service;

  // ═══════════════════════════════════════════════════════════════
  // PROVIDERS
  // ═══════════════════════════════════════════════════════════════

  app.get(`${prefix}/providers`, async () => {
    return {
      ok: true,
      registered: registry.sources(),
      rotation: orchestrator.rotationStatus(),
    };
  });

  app.post(`${prefix}/providers/:id/reset`, async (req: FastifyRequest<{
    Params: { id: string };
  }>) => {
    const provider = orchestrator.resetProvider(req.params.id);
    return { ok: true, provider };
  });

  // ═══════════════════════════════════════════════════════════════
  // NORMALIZE / MERGE
  // ═══════════════════════════════════════════════════════════════

  app.post(`${prefix}/normalize`, async (req) => {
    const body = parse(normalizeBodySchema, req.body);

    if (body.payloads !== undefined) {
      const outcomes = normalizeBatch(registry, body.provider, body.payloads, {
        logger: service.logger,
      });
      return {
        ok: true,
        count: outcomes.length,
        failed: outcomes.filter(o => !o.ok).length,
        results: outcomes.map(o =>
          o.ok
            ? { ok: true, quote: quoteView(o.quote) }
            : { ok: false, error: o.error.code, message: o.error.message }
        ),
      };
    }

    return { ok: true, quote: quoteView(normalize(registry, body.provider, body.payload)) };
  });

  app.post(`${prefix}/merge`, async (req) => {
    const body = parse(mergeBodySchema, req.body);
    const groups = body.groups.map(g => ({
      provider: g.provider,
      records: g.records.map(fromStructured),
    }));

    const engine = new MergeEngine({ sourceWeights: body.sourceWeights }, undefined, service.logger);
    const { quotes, stats } = engine.merge(groups);

    return {
      ok: true,
      quotes: [...quotes.values()].map(quoteView),
      stats,
    };
  });

  // ═══════════════════════════════════════════════════════════════
  // FETCH
  // ═══════════════════════════════════════════════════════════════

  app.post(`${prefix}/batch`, async (req) => {
    const body = parse(batchBodySchema, req.body);
    const results = await orchestrator.fetchQuotesBatch(body.codes, body.overrides);

    const items = [...results.entries()].map(([code, item]) => batchItemView(code, item));
    return {
      ok: true,
      count: items.length,
      failed: items.filter(i => !i.ok).length,
      results: items,
    };
  });

  app.get(`${prefix}/:code`, async (req: FastifyRequest<{
    Params: { code: string };
    Querystring: Record<string, string | undefined>;
  }>) => {
    const code = parse(codeSchema, req.params.code);
    const query = parse(quoteQuerySchema, req.query);
    const overrides = query.merge === undefined ? undefined : { mergeSources: query.merge === 'true' };

    const result = await orchestrator.fetchQuote(code, overrides);
    return { ok: true, ...resultView(result) };
  });
}
