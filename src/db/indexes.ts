/**
 * Database Indexes
 * Run on startup when the Mongo cache backend is selected
 */

import { defaultLogger, type Logger } from '../common/host.deps.js';
import { QUOTE_CACHE_COLLECTION } from '../modules/quotes/cache/mongo.cache.js';
import { getMongoDb } from './mongoose.js';

export async function ensureIndexes(logger: Logger = defaultLogger): Promise<void> {
  const db = getMongoDb();

  // Documents disappear once expiresAt has passed
  await db.collection(QUOTE_CACHE_COLLECTION).createIndex(
    { expiresAt: 1 },
    { expireAfterSeconds: 0, name: 'quote_cache_ttl' }
  );
  logger.info({ collection: QUOTE_CACHE_COLLECTION }, '[DB] quote_cache indexes ensured');
}
