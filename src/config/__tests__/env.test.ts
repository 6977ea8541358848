/**
 * Environment Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { AppError } from '../../common/errors.js';
import { buildQuoteConfig, loadEnv } from '../env.js';

describe('loadEnv', () => {
  it('should apply defaults to an empty environment', () => {
    const env = loadEnv({});
    expect(env).toMatchObject({
      NODE_ENV: 'development',
      HOST: '0.0.0.0',
      PORT: 8001,
      LOG_LEVEL: 'info',
      CORS_ORIGINS: '*',
      QUOTE_CACHE_BACKEND: 'memory',
    });
    expect(env.QUOTE_PROVIDERS).toEqual([
      'tencent',
      'eastmoney',
      'akshare',
      'baostock',
      'sina',
      'joinquant',
      'tushare',
    ]);
  });

  it('should parse the provider list, dropping blanks and repeats', () => {
    expect(loadEnv({ QUOTE_PROVIDERS: 'sina, tencent,,sina' }).QUOTE_PROVIDERS).toEqual(['sina', 'tencent']);
  });

  it('should reject unknown providers', () => {
    expect(() => loadEnv({ QUOTE_PROVIDERS: 'sina,yahoo' })).toThrow(
      'Invalid environment: QUOTE_PROVIDERS: unknown provider "yahoo"'
    );
  });

  it('should require MONGO_URL for the mongo backend', () => {
    expect(() => loadEnv({ QUOTE_CACHE_BACKEND: 'mongo' })).toThrow(
      'Invalid environment: MONGO_URL: required when QUOTE_CACHE_BACKEND=mongo'
    );
    expect(loadEnv({ QUOTE_CACHE_BACKEND: 'mongo', MONGO_URL: 'mongodb://localhost:27017/quotes' }).MONGO_URL).toBe(
      'mongodb://localhost:27017/quotes'
    );
  });

  it('should parse JSON-valued settings', () => {
    const env = loadEnv({
      QUOTE_SOURCE_WEIGHTS: '{"sina":0.95}',
      QUOTE_ENDPOINTS: '{"eastmoney":{"urlTemplate":"https://push.example/{secid}","dataPath":"data"}}',
    });
    expect(env.QUOTE_SOURCE_WEIGHTS).toEqual({ sina: 0.95 });
    expect(env.QUOTE_ENDPOINTS).toEqual({
      eastmoney: { urlTemplate: 'https://push.example/{secid}', dataPath: 'data' },
    });
  });

  it('should report malformed JSON and out-of-range weights', () => {
    expect(() => loadEnv({ QUOTE_SOURCE_WEIGHTS: '{sina' })).toThrow(
      'Invalid environment: QUOTE_SOURCE_WEIGHTS: must be valid JSON'
    );
    expect(() => loadEnv({ QUOTE_SOURCE_WEIGHTS: '{"sina":2}' })).toThrow(/QUOTE_SOURCE_WEIGHTS\.sina/);
  });

  it('should raise INVALID_CONFIG for bad numbers', () => {
    try {
      loadEnv({ PORT: 'abc' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      expect(err).toMatchObject({ code: 'INVALID_CONFIG' });
    }
  });
});

describe('buildQuoteConfig', () => {
  it('should map the environment onto the quote service config', () => {
    const config = buildQuoteConfig(
      loadEnv({
        QUOTE_PROVIDERS: 'eastmoney,sina',
        QUOTE_MAX_RETRIES: '1',
        QUOTE_COOLDOWN_MS: '30000',
      })
    );

    expect(config).toEqual({
      providers: ['eastmoney', 'sina'],
      cacheBackend: 'memory',
      mongoUrl: undefined,
      endpoints: {},
      fetch: {
        maxRetries: 1,
        failureThreshold: undefined,
        cooldownDurationMs: 30000,
        maxCacheStalenessMs: undefined,
        cacheTtlMs: undefined,
        sourceWeights: undefined,
      },
    });
  });
});
