/**
 * Q6 — Rotation Contracts
 * =======================
 */

import type { ProviderAttemptSummary } from '../../../common/errors.js';
import type { DataSource, QuoteRecord } from '../contracts/quote.types.js';
import type { SourceWeights } from '../merge/merge.types.js';

// ═══════════════════════════════════════════════════════════════
// PROVIDER SLOTS
// ═══════════════════════════════════════════════════════════════

export type ProviderStatus = 'UP' | 'DEGRADED' | 'COOLDOWN';

/** Handed out by ProviderPool.reserve(); seq orders requests by entry. */
export interface Reservation {
  start: number;
  seq: number;
}

export interface ProviderSpec {
  id: DataSource;
  weight?: number;
}

/**
 * Runtime state of one pool member. Slots live in a fixed array; index
 * is the stable slot id.
 */
export interface ProviderSlot {
  readonly index: number;
  readonly id: DataSource;
  readonly weight: number;
  consecutiveFailures: number;
  lastFailureAt?: number;
  lastSuccessAt?: number;
  cooldownUntil?: number;
  lastError?: string;
}

export interface ProviderSlotStatus {
  index: number;
  id: DataSource;
  weight: number;
  status: ProviderStatus;
  consecutiveFailures: number;
  lastFailureAt: string | null;
  lastSuccessAt: string | null;
  cooldownUntil: string | null;
  lastError: string | null;
}

export interface RotationStatus {
  pointer: number;
  currentProvider: DataSource;
  nextProvider: DataSource | null;
  totalProviders: number;
  providers: ProviderSlotStatus[];
}

export interface CooldownPolicy {
  failureThreshold: number;
  cooldownDurationMs: number;
}

// ═══════════════════════════════════════════════════════════════
// ORCHESTRATOR
// ═══════════════════════════════════════════════════════════════

export interface QuoteFetchConfig extends CooldownPolicy {
  /** Extra attempts against the same provider after the first one. */
  maxRetries: number;
  retryBackoffMs: number;
  maxBackoffMs: number;
  maxCacheStalenessMs: number;
  cacheTtlMs: number;
  cacheTimeoutMs: number;
  batchConcurrency: number;
  sourceWeights: SourceWeights;
  mergeSources: boolean;
}

export type QuoteFetchOverrides = Partial<QuoteFetchConfig>;

export interface QuoteResult {
  quote: QuoteRecord;
  cached: boolean;
  provider: DataSource;
  cachedAt?: Date;
  attempts: ProviderAttemptSummary[];
  requestId: string;
}

export type BatchItemResult =
  | { ok: true; result: QuoteResult }
  | { ok: false; error: Error };

export interface BatchOptions {
  signal?: AbortSignal;
}
