/**
 * Q5 — MongoDB Cache Backend
 * ==========================
 *
 * Collection: quote_cache
 * Document:   { _id: key, value, expiresAt }
 *
 * The TTL index on expiresAt (see db/indexes.ts) removes documents in the
 * background; reads also filter on expiresAt since the TTL monitor only
 * runs once a minute.
 */

import mongoose, { mongo, type Connection } from 'mongoose';
import { BackendUnavailableError, errorMessage } from '../../../common/errors.js';
import { defaultClock, type Clock } from '../../../common/host.deps.js';
import type { CacheBackend } from './cache.types.js';

export const QUOTE_CACHE_COLLECTION = 'quote_cache';

export interface QuoteCacheDoc {
  _id: string;
  value: string;
  expiresAt: Date;
}

/** The slice of the driver collection the backend uses. */
export interface QuoteCacheCollection {
  findOne(filter: mongo.Filter<QuoteCacheDoc>): Promise<QuoteCacheDoc | null>;
  updateOne(
    filter: mongo.Filter<QuoteCacheDoc>,
    update: mongo.UpdateFilter<QuoteCacheDoc>,
    options: mongo.UpdateOptions
  ): Promise<unknown>;
  countDocuments(
    filter: mongo.Filter<QuoteCacheDoc>,
    options: mongo.CountDocumentsOptions
  ): Promise<number>;
}

export interface MongoCacheBackendOptions {
  collection: QuoteCacheCollection;
  isConnected?: () => boolean;
  clock?: Clock;
}

function isTransportError(err: unknown): boolean {
  return (
    err instanceof mongo.MongoNetworkError ||
    err instanceof mongo.MongoServerSelectionError ||
    err instanceof mongo.MongoNotConnectedError ||
    err instanceof mongo.MongoTopologyClosedError
  );
}

export class MongoCacheBackend implements CacheBackend {
  readonly name = 'mongo';
  private readonly collection: QuoteCacheCollection;
  private readonly isConnected: () => boolean;
  private readonly clock: Clock;

  constructor(options: MongoCacheBackendOptions) {
    this.collection = options.collection;
    this.isConnected = options.isConnected ?? (() => true);
    this.clock = options.clock ?? defaultClock;
  }

  /**
   * Backend bound to the default mongoose connection.
   */
  static fromConnection(connection: Connection = mongoose.connection): MongoCacheBackend {
    return new MongoCacheBackend({
      collection: connection.collection<QuoteCacheDoc>(QUOTE_CACHE_COLLECTION),
      isConnected: () => connection.readyState === mongoose.ConnectionStates.connected,
    });
  }

  async get(key: string): Promise<string | undefined> {
    const doc = await this.guard('get', () =>
      this.collection.findOne({ _id: key, expiresAt: { $gt: this.now() } })
    );
    return doc?.value;
  }

  async set(key: string, value: string, ttlMs: number): Promise<void> {
    const expiresAt = new Date(this.clock.now() + ttlMs);
    await this.guard('set', () =>
      this.collection.updateOne({ _id: key }, { $set: { value, expiresAt } }, { upsert: true })
    );
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.guard('exists', () =>
      this.collection.countDocuments({ _id: key, expiresAt: { $gt: this.now() } }, { limit: 1 })
    );
    return count > 0;
  }

  private now(): Date {
    return new Date(this.clock.now());
  }

  private async guard<T>(operation: string, call: () => Promise<T>): Promise<T> {
    if (!this.isConnected()) {
      throw new BackendUnavailableError(`mongo cache ${operation}: not connected`);
    }
    try {
      return await call();
    } catch (err) {
      if (isTransportError(err)) {
        throw new BackendUnavailableError(`mongo cache ${operation}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
      throw err;
    }
  }
}
