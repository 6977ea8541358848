/**
 * MongoDB Connection
 * ==================
 */

import mongoose, { type mongo } from 'mongoose';
import { defaultLogger, type Logger } from '../common/host.deps.js';

export async function connectMongo(url: string, logger: Logger = defaultLogger): Promise<void> {
  if (mongoose.connection.readyState === mongoose.ConnectionStates.connected) return;

  await mongoose.connect(url, { serverSelectionTimeoutMS: 5000 });
  logger.info({ db: mongoose.connection.name }, '[DB] MongoDB connected');
}

export async function disconnectMongo(): Promise<void> {
  await mongoose.disconnect();
}

/**
 * Native db handle of the default connection. Throws before connectMongo().
 */
export function getMongoDb(): mongo.Db {
  const db = mongoose.connection.db;
  if (!db) {
    throw new Error('[DB] MongoDB is not connected');
  }
  return db;
}
