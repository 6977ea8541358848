/**
 * Environment Configuration
 * =========================
 *
 * Validated once at startup. Nothing here reads process.env on import;
 * server.ts calls loadEnv(process.env).
 */

import { z } from 'zod';
import { AppError } from '../common/errors.js';
import { ALL_SOURCES, type DataSource } from '../modules/quotes/contracts/quote.types.js';
import { dataSourceSchema } from '../modules/quotes/quote.record.js';
import type { QuoteServiceConfig } from '../modules/quotes/quote.service.js';

/** JSON text parsed, then checked against `schema`. */
function jsonString<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((text, ctx): unknown => {
      try {
        return JSON.parse(text);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be valid JSON' });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

const providerList = z
  .string()
  .transform((text, ctx): DataSource[] => {
    const ids = text.split(',').map(s => s.trim()).filter(Boolean);
    const providers: DataSource[] = [];
    for (const id of ids) {
      const parsed = dataSourceSchema.safeParse(id);
      if (!parsed.success) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown provider "${id}"` });
        continue;
      }
      if (!providers.includes(parsed.data)) providers.push(parsed.data);
    }
    if (providers.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'at least one provider is required' });
    }
    return providers;
  });

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().min(0);

const envSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8001),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    CORS_ORIGINS: z.string().default('*'),

    MONGO_URL: z.string().min(1).optional(),

    QUOTE_CACHE_BACKEND: z.enum(['memory', 'mongo']).default('memory'),
    QUOTE_PROVIDERS: providerList.default(ALL_SOURCES.join(',')),
    QUOTE_MAX_RETRIES: nonNegativeInt.optional(),
    QUOTE_FAILURE_THRESHOLD: positiveInt.optional(),
    QUOTE_COOLDOWN_MS: nonNegativeInt.optional(),
    QUOTE_MAX_CACHE_STALENESS_MS: nonNegativeInt.optional(),
    QUOTE_CACHE_TTL_MS: positiveInt.optional(),
    QUOTE_SOURCE_WEIGHTS: jsonString(z.record(dataSourceSchema, z.number().min(0).max(1))).optional(),
    QUOTE_ENDPOINTS: jsonString(
      z.record(
        dataSourceSchema,
        z.object({ urlTemplate: z.string().min(1), dataPath: z.string().optional() }).strict()
      )
    ).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.QUOTE_CACHE_BACKEND === 'mongo' && !env.MONGO_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MONGO_URL'],
        message: 'required when QUOTE_CACHE_BACKEND=mongo',
      });
    }
  });

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment map. Throws AppError(INVALID_CONFIG) listing
 * every offending variable.
 */
export function loadEnv(source: Record<string, string | undefined>): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new AppError('INVALID_CONFIG', `Invalid environment: ${issues.join('; ')}`, 500);
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════
// QUOTE SERVICE CONFIG
// ═══════════════════════════════════════════════════════════════

export function buildQuoteConfig(env: Env): QuoteServiceConfig {
  return {
    providers: env.QUOTE_PROVIDERS,
    cacheBackend: env.QUOTE_CACHE_BACKEND,
    mongoUrl: env.MONGO_URL,
    endpoints: env.QUOTE_ENDPOINTS ?? {},
    fetch: {
      maxRetries: env.QUOTE_MAX_RETRIES,
      failureThreshold: env.QUOTE_FAILURE_THRESHOLD,
      cooldownDurationMs: env.QUOTE_COOLDOWN_MS,
      maxCacheStalenessMs: env.QUOTE_MAX_CACHE_STALENESS_MS,
      cacheTtlMs: env.QUOTE_CACHE_TTL_MS,
      sourceWeights: env.QUOTE_SOURCE_WEIGHTS,
    },
  };
}
