/**
 * Q6 — Provider Health & Cooldown
 * ===============================
 *
 * Circuit breaker per provider slot:
 * - failed request cycle → consecutiveFailures + 1, DEGRADED
 * - failureThreshold reached → COOLDOWN until now + cooldownDurationMs
 * - any success → UP, streak reset
 * - cooldown expiry is noticed lazily, the next time the slot is checked
 *
 * Every function here is synchronous; callers never hold slot state
 * across an await.
 */

import type { CooldownPolicy, ProviderSlot, ProviderStatus } from './rotation.types.js';

/**
 * Register a successful request cycle - reset streak
 */
export function registerSuccess(slot: ProviderSlot, now: number): void {
  slot.consecutiveFailures = 0;
  slot.cooldownUntil = undefined;
  slot.lastError = undefined;
  slot.lastSuccessAt = now;
}

/**
 * Register an exhausted request cycle. Returns true when this failure
 * put the provider into cooldown.
 */
export function registerFailure(
  slot: ProviderSlot,
  policy: CooldownPolicy,
  now: number,
  error?: string
): boolean {
  slot.consecutiveFailures++;
  slot.lastFailureAt = now;
  slot.lastError = error;

  if (slot.consecutiveFailures >= policy.failureThreshold) {
    slot.cooldownUntil = now + policy.cooldownDurationMs;
    return true;
  }
  return false;
}

/**
 * Whether the slot must be skipped right now. An expired cooldown is
 * cleared here and the provider starts over with a clean streak.
 */
export function isCoolingDown(slot: ProviderSlot, now: number): boolean {
  if (slot.cooldownUntil === undefined) return false;
  if (now < slot.cooldownUntil) return true;

  slot.cooldownUntil = undefined;
  slot.consecutiveFailures = 0;
  return false;
}

/**
 * Reset circuit breaker (admin action)
 */
export function resetSlot(slot: ProviderSlot): void {
  slot.consecutiveFailures = 0;
  slot.cooldownUntil = undefined;
  slot.lastFailureAt = undefined;
  slot.lastError = undefined;
}

/** Read-only view; does not clear an expired cooldown. */
export function slotStatus(slot: ProviderSlot, now: number): ProviderStatus {
  if (slot.cooldownUntil !== undefined && now < slot.cooldownUntil) return 'COOLDOWN';
  if (slot.consecutiveFailures > 0) return 'DEGRADED';
  return 'UP';
}
