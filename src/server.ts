/**
 * Server entry point
 */

import { buildApp } from './app.js';
import { buildQuoteConfig, loadEnv } from './config/env.js';
import { ensureIndexes } from './db/indexes.js';
import { connectMongo, disconnectMongo } from './db/mongoose.js';
import { createQuoteService } from './modules/quotes/quote.service.js';

async function main(): Promise<void> {
  const env = loadEnv(process.env);
  const quoteConfig = buildQuoteConfig(env);

  const app = buildApp({
    createService: logger => createQuoteService(quoteConfig, { logger }),
    logLevel: env.LOG_LEVEL,
    corsOrigins: env.CORS_ORIGINS,
    nodeEnv: env.NODE_ENV,
  });

  if (quoteConfig.cacheBackend === 'mongo' && quoteConfig.mongoUrl) {
    await connectMongo(quoteConfig.mongoUrl, app.log);
    await ensureIndexes(app.log);
    app.addHook('onClose', async () => {
      await disconnectMongo();
    });
  }

  const shutdown = async (signal: string) => {
    app.log.info({ signal }, '[Server] Shutting down');
    await app.close();
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch(err => {
        app.log.error(err, '[Server] Shutdown failed');
        process.exit(1);
      });
    });
  }

  await app.listen({ host: env.HOST, port: env.PORT });
}

main().catch(err => {
  console.error('[Server] Fatal startup error:', err);
  process.exit(1);
});
