/**
 * Q4 — Quality-Weighted Merge Engine
 * ==================================
 *
 * Combines candidate records for the same instrument coming from several
 * providers into one record per code.
 *
 * Per code:
 * 1. drop candidates failing isValid()
 * 2. rank candidates by effective weight = sourceWeight × completeness,
 *    then newest fetchedAt, then configured priority, then input order
 * 3. every field takes its value from the best-ranked candidate that has it;
 *    a contradictory high/low pair is taken from one candidate instead
 * 4. qualityScore = blend of source factor, completeness and freshness
 *
 * Inputs are never mutated; merged records are new objects.
 */

import { defaultClock, defaultLogger, type Clock, type Logger } from '../../../common/host.deps.js';
import {
  QUOTE_FIELDS,
  type DataSource,
  type QuoteField,
  type QuoteFields,
  type QuoteRecord,
} from '../contracts/quote.types.js';
import {
  clamp01,
  completeness,
  createQuoteRecord,
  hasField,
  isValid,
  withQualityScore,
} from '../quote.record.js';
import { resolveMergeOptions } from './merge.config.js';
import type {
  MergeGroup,
  MergeOptions,
  MergeResult,
  MergeStats,
  ResolvedMergeOptions,
} from './merge.types.js';

interface Candidate {
  record: QuoteRecord;
  provider: DataSource;
  effectiveWeight: number;
  priorityRank: number;
  order: number;
}

interface MergedCode {
  quote: QuoteRecord;
  contributors: DataSource[];
}

function copyFrom<K extends QuoteField>(target: QuoteFields, source: QuoteRecord, field: K): void {
  target[field] = source[field];
}

export class MergeEngine {
  private readonly options: ResolvedMergeOptions;

  constructor(
    options: MergeOptions = {},
    private readonly clock: Clock = defaultClock,
    private readonly logger: Logger = defaultLogger
  ) {
    this.options = resolveMergeOptions(options);
  }

  sourceWeight(provider: DataSource): number {
    return this.options.weights[provider];
  }

  effectiveWeight(provider: DataSource, record: QuoteRecord): number {
    return this.sourceWeight(provider) * completeness(record);
  }

  merge(groups: readonly MergeGroup[]): MergeResult {
    const buckets = new Map<string, Candidate[]>();
    const seenCodes = new Set<string>();
    const bySource: MergeStats['bySource'] = {};
    let totalRecords = 0;
    let droppedInvalid = 0;

    for (const group of groups) {
      for (const record of group.records) {
        totalRecords++;
        bySource[group.provider] = (bySource[group.provider] ?? 0) + 1;
        seenCodes.add(record.code);

        if (!isValid(record)) {
          droppedInvalid++;
          continue;
        }

        const bucket = buckets.get(record.code) ?? [];
        bucket.push({
          record,
          provider: group.provider,
          effectiveWeight: this.effectiveWeight(group.provider, record),
          priorityRank: this.priorityRank(group.provider),
          order: totalRecords,
        });
        buckets.set(record.code, bucket);
      }
    }

    const quotes = new Map<string, QuoteRecord>();
    const contributors: MergeStats['contributors'] = {};
    const byMarket: MergeStats['byMarket'] = { SH: 0, SZ: 0, BJ: 0, UNKNOWN: 0 };
    const byBoard: MergeStats['byBoard'] = {};
    let scoreSum = 0;

    for (const code of [...buckets.keys()].sort()) {
      const candidates = buckets.get(code) ?? [];
      const merged = this.mergeCandidates(code, candidates);

      quotes.set(code, merged.quote);
      contributors[code] = merged.contributors;
      byMarket[merged.quote.market ?? 'UNKNOWN']++;
      const board = merged.quote.board ?? 'UNKNOWN';
      byBoard[board] = (byBoard[board] ?? 0) + 1;
      scoreSum += merged.quote.qualityScore;
    }

    const invalidCodes = [...seenCodes].filter(code => !buckets.has(code)).sort();

    const stats: MergeStats = {
      totalRecords,
      uniqueCodes: quotes.size,
      droppedInvalid,
      invalidCodes,
      contributors,
      bySource,
      byMarket,
      byBoard,
      averageQualityScore: quotes.size > 0 ? round4(scoreSum / quotes.size) : 0,
    };

    this.logger.info(
      { totalRecords, uniqueCodes: stats.uniqueCodes, droppedInvalid },
      `[Merge] ${totalRecords} records -> ${stats.uniqueCodes} codes`
    );

    return { quotes, stats };
  }

  // ─────────────────────────────────────────────────────────────
  // PER-CODE MERGE
  // ─────────────────────────────────────────────────────────────

  private mergeCandidates(code: string, candidates: Candidate[]): MergedCode {
    const ranked = [...candidates].sort(compareCandidates);
    const top = ranked[0];

    const picks = new Map<QuoteField, Candidate>();
    for (const field of QUOTE_FIELDS) {
      const winner = ranked.find(c => hasField(c.record, field));
      if (winner) picks.set(field, winner);
    }
    reconcileRange(picks, ranked);

    const fields: QuoteFields = {};
    const winners = new Set<Candidate>();
    let weightSum = 0;
    for (const [field, winner] of picks) {
      copyFrom(fields, winner.record, field);
      winners.add(winner);
      weightSum += winner.effectiveWeight;
    }
    const mergedCount = picks.size;

    const contributing = ranked.filter(c => winners.has(c));
    const newestFetch = Math.max(...contributing.map(c => c.record.fetchedAt.getTime()));

    const draft = createQuoteRecord({
      code,
      ...fields,
      source: top.record.source,
      fetchedAt: new Date(newestFetch),
    });

    const sourceFactor = mergedCount > 0 ? weightSum / mergedCount : 0;
    const quote = withQualityScore(
      draft,
      this.qualityScore(sourceFactor, completeness(draft), newestFetch)
    );

    return {
      quote,
      contributors: uniqueByPriority(contributing.map(c => c.provider), this.options.priority),
    };
  }

  private qualityScore(sourceFactor: number, completenessFactor: number, newestFetch: number): number {
    const { blend } = this.options;
    const freshness = this.freshness(newestFetch);
    return clamp01(
      blend.source * sourceFactor +
        blend.completeness * completenessFactor +
        blend.freshness * freshness
    );
  }

  /** Linear decay from 1 (just fetched) to 0 at the staleness horizon. */
  freshness(fetchedAtMs: number): number {
    const horizon = this.options.stalenessHorizonMs;
    if (horizon <= 0) return 0;
    const age = Math.max(0, this.clock.now() - fetchedAtMs);
    return clamp01(1 - age / horizon);
  }

  private priorityRank(provider: DataSource): number {
    const index = this.options.priority.indexOf(provider);
    return index === -1 ? this.options.priority.length : index;
  }
}

/**
 * high and low picked from different candidates can contradict each other.
 * The pair then comes from the best-ranked candidate carrying both; when
 * none does, the lower-ranked side is dropped.
 */
function reconcileRange(picks: Map<QuoteField, Candidate>, ranked: Candidate[]): void {
  const high = picks.get('high');
  const low = picks.get('low');
  if (!high || !low || high === low) return;
  if ((high.record.high ?? 0) >= (low.record.low ?? 0)) return;

  const pair = ranked.find(c => hasField(c.record, 'high') && hasField(c.record, 'low'));
  if (pair) {
    picks.set('high', pair);
    picks.set('low', pair);
    return;
  }
  picks.delete(ranked.indexOf(high) < ranked.indexOf(low) ? 'low' : 'high');
}

function compareCandidates(a: Candidate, b: Candidate): number {
  if (a.effectiveWeight !== b.effectiveWeight) return b.effectiveWeight - a.effectiveWeight;

  const fetchedDiff = b.record.fetchedAt.getTime() - a.record.fetchedAt.getTime();
  if (fetchedDiff !== 0) return fetchedDiff;

  if (a.priorityRank !== b.priorityRank) return a.priorityRank - b.priorityRank;
  return a.order - b.order;
}

function uniqueByPriority(
  providers: DataSource[],
  priority: readonly DataSource[]
): DataSource[] {
  const rank = (p: DataSource) => {
    const i = priority.indexOf(p);
    return i === -1 ? priority.length : i;
  };
  return [...new Set(providers)].sort((a, b) => rank(a) - rank(b) || a.localeCompare(b));
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * One-shot merge with a fresh engine.
 */
export function merge(
  groups: readonly MergeGroup[],
  options?: MergeOptions,
  deps: { clock?: Clock; logger?: Logger } = {}
): MergeResult {
  return new MergeEngine(options, deps.clock, deps.logger).merge(groups);
}
