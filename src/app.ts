import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { AppError } from './common/errors.js';
import type { Logger } from './common/host.deps.js';
import { registerQuoteRoutes } from './modules/quotes/routes/quotes.routes.js';
import type { QuoteService } from './modules/quotes/quote.service.js';

export interface BuildAppOptions {
  /** Receives the Fastify (pino) logger so services log through it. */
  createService: (logger: Logger) => QuoteService;
  logLevel?: string;
  corsOrigins?: string;
  nodeEnv?: 'development' | 'production' | 'test';
}

/**
 * Build Fastify Application
 */
export function buildApp(options: BuildAppOptions): FastifyInstance {
  const app = Fastify({
    logger: {
      level: options.logLevel ?? 'info',
    },
    trustProxy: true,
  });

  const service = options.createService(app.log);
  const corsOrigins = options.corsOrigins ?? '*';

  // CORS
  app.register(cors, {
    origin: corsOrigins === '*' ? true : corsOrigins.split(','),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, _req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) app.log.error(err);
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation / body parsing errors
    if (err.validation || (err.statusCode !== undefined && err.statusCode < 500)) {
      return reply.status(err.statusCode ?? 400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    app.log.error(err);
    return reply.status(500).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: options.nodeEnv === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/api/health', async () => ({
    ok: true,
    cache: service.cache.name,
    providers: service.pool.ids(),
    timestamp: new Date().toISOString(),
  }));

  app.register(async (instance) => {
    await registerQuoteRoutes(instance, service);
  });

  app.addHook('onClose', async () => {
    await service.close();
  });

  return app;
}
