/**
 * Q6 — Provider Pool
 * ==================
 *
 * Fixed array of provider slots plus the rotation pointer.
 *
 * Pointer semantics:
 * - reserve() hands out the current pointer and advances it by one, so
 *   concurrent requests start at different providers
 * - a request answered by the provider at index j leaves the pointer at
 *   j + 1, i.e. past the provider that answered, unless a later request
 *   has reserved since; the pointer never moves back for a stale request
 *
 * All mutation happens in synchronous methods; nothing here awaits.
 */

import { UnknownProviderError } from '../../../common/errors.js';
import { defaultClock, type Clock } from '../../../common/host.deps.js';
import type { DataSource } from '../contracts/quote.types.js';
import { DEFAULT_SOURCE_WEIGHTS } from '../merge/merge.config.js';
import type { SourceWeights } from '../merge/merge.types.js';
import { clamp01 } from '../quote.record.js';
import {
  isCoolingDown,
  registerFailure,
  registerSuccess,
  resetSlot,
  slotStatus,
} from './provider.health.js';
import type {
  CooldownPolicy,
  ProviderSlot,
  ProviderSpec,
  Reservation,
  RotationStatus,
} from './rotation.types.js';

function toSpec(entry: DataSource | ProviderSpec): ProviderSpec {
  return typeof entry === 'string' ? { id: entry } : entry;
}

function iso(ms: number | undefined): string | null {
  return ms === undefined ? null : new Date(ms).toISOString();
}

export class ProviderPool {
  private readonly slots: ProviderSlot[];
  private cursor = 0;
  private lastSeq = 0;

  constructor(
    providers: readonly (DataSource | ProviderSpec)[],
    private readonly clock: Clock = defaultClock
  ) {
    if (providers.length === 0) {
      throw new Error('Provider pool needs at least one provider');
    }

    const seen = new Set<DataSource>();
    this.slots = providers.map(toSpec).map((spec, index) => {
      if (seen.has(spec.id)) {
        throw new Error(`Provider "${spec.id}" listed twice in pool`);
      }
      seen.add(spec.id);
      return {
        index,
        id: spec.id,
        weight: clamp01(spec.weight ?? DEFAULT_SOURCE_WEIGHTS[spec.id]),
        consecutiveFailures: 0,
      };
    });
  }

  get size(): number {
    return this.slots.length;
  }

  get pointer(): number {
    return this.cursor;
  }

  ids(): DataSource[] {
    return this.slots.map(s => s.id);
  }

  /** Static weights of the pool members, usable as merge source weights. */
  weights(): SourceWeights {
    const weights: SourceWeights = {};
    for (const slot of this.slots) weights[slot.id] = slot.weight;
    return weights;
  }

  slotAt(index: number): ProviderSlot {
    const slot = this.slots[index % this.slots.length];
    if (!slot) throw new RangeError(`No provider slot at index ${index}`);
    return slot;
  }

  slotOf(id: string): ProviderSlot {
    const slot = this.slots.find(s => s.id === id);
    if (!slot) throw new UnknownProviderError(id, this.ids());
    return slot;
  }

  // ─────────────────────────────────────────────────────────────
  // ROTATION
  // ─────────────────────────────────────────────────────────────

  /**
   * Start index for a new request; advances the pointer once.
   */
  reserve(): Reservation {
    const start = this.cursor;
    this.cursor = (start + 1) % this.slots.length;
    this.lastSeq++;
    return { start, seq: this.lastSeq };
  }

  /** Visit order for a request that reserved `start`: every slot once. */
  order(start: number): number[] {
    return this.slots.map((_, offset) => (start + offset) % this.slots.length);
  }

  isEligible(index: number): boolean {
    return !isCoolingDown(this.slotAt(index), this.clock.now());
  }

  // ─────────────────────────────────────────────────────────────
  // OUTCOMES
  // ─────────────────────────────────────────────────────────────

  recordSuccess(index: number, reservation: Reservation): void {
    const slot = this.slotAt(index);
    registerSuccess(slot, this.clock.now());
    if (reservation.seq === this.lastSeq) {
      this.cursor = (slot.index + 1) % this.slots.length;
    }
  }

  /** Returns true when the provider entered cooldown. */
  recordFailure(index: number, policy: CooldownPolicy, error?: string): boolean {
    return registerFailure(this.slotAt(index), policy, this.clock.now(), error);
  }

  reset(id: string): ProviderSlot {
    const slot = this.slotOf(id);
    resetSlot(slot);
    return slot;
  }

  // ─────────────────────────────────────────────────────────────
  // STATUS
  // ─────────────────────────────────────────────────────────────

  status(): RotationStatus {
    const now = this.clock.now();
    const current = this.slotAt(this.cursor);
    const next = this.order(this.cursor)
      .map(i => this.slotAt(i))
      .find(s => s.cooldownUntil === undefined || now >= s.cooldownUntil);

    return {
      pointer: this.cursor,
      currentProvider: current.id,
      nextProvider: next ? next.id : null,
      totalProviders: this.slots.length,
      providers: this.slots.map(slot => ({
        index: slot.index,
        id: slot.id,
        weight: slot.weight,
        status: slotStatus(slot, now),
        consecutiveFailures: slot.consecutiveFailures,
        lastFailureAt: iso(slot.lastFailureAt),
        lastSuccessAt: iso(slot.lastSuccessAt),
        cooldownUntil: iso(slot.cooldownUntil),
        lastError: slot.lastError ?? null,
      })),
    };
  }
}
