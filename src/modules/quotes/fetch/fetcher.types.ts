/**
 * Q7 — Fetch Collaborator
 * =======================
 *
 * Transport boundary: returns the provider's raw payload for one
 * instrument, or throws FetchError. Retries and rotation live in the
 * orchestrator, never here.
 */

import type { DataSource } from '../contracts/quote.types.js';

export interface QuoteFetcher {
  fetch(provider: DataSource, code: string, signal?: AbortSignal): Promise<unknown>;
}

export interface ProviderEndpoint {
  /** URL with {code}, {market} and {secid} placeholders. */
  urlTemplate: string;
  /** Dot path to the quote object inside the response body, e.g. "data.diff.0". */
  dataPath?: string;
}

export type ProviderEndpoints = Partial<Record<DataSource, ProviderEndpoint>>;

export type RateLimitConfig = {
  minTime: number;      // ms between requests
  maxConcurrent: number;
};
