/**
 * Per-ticker health state machine.
 *
 *   healthy  → degraded  first failure
 *   degraded → cooldown  failure that brings consecutiveErrors to the threshold
 *   cooldown → healthy   cooldown expired, or operator override
 *   any      → healthy   success
 *
 * Transitions are pure: every function returns a new EntityState and never
 * mutates its input. Stores apply them and persist the result.
 */

import type { EntityHealth, EntityState } from './types.js';
import { emptyEntityState } from './types.js';

export interface CooldownPolicy {
  maxConsecutiveErrors: number;
  errorCooldownMs: number;
}

export function isInCooldown(state: EntityState, now: number): boolean {
  return state.inCooldownUntil !== null && state.inCooldownUntil > now;
}

export function classifyEntityHealth(state: EntityState, now: number): EntityHealth {
  const settled = settleExpiredCooldown(state, now);
  if (isInCooldown(settled, now)) return 'cooldown';
  return settled.consecutiveErrors > 0 ? 'degraded' : 'healthy';
}

/**
 * Cooldown ends exactly at `inCooldownUntil`. An expired cooldown returns the
 * entity to healthy: the error streak restarts, `lastErrorAt` is kept.
 */
export function settleExpiredCooldown(state: EntityState, now: number): EntityState {
  if (state.inCooldownUntil === null || state.inCooldownUntil > now) return state;
  return { ...state, consecutiveErrors: 0, inCooldownUntil: null };
}

export function applySuccess(state: EntityState | undefined, at: number): EntityState {
  return {
    ...(state ?? emptyEntityState()),
    lastSuccessAt: at,
    consecutiveErrors: 0,
    inCooldownUntil: null,
  };
}

export function applyFailure(state: EntityState | undefined, at: number, policy: CooldownPolicy): EntityState {
  const current = settleExpiredCooldown(state ?? emptyEntityState(), at);
  const consecutiveErrors = current.consecutiveErrors + 1;
  const reachedThreshold = consecutiveErrors === policy.maxConsecutiveErrors;
  return {
    ...current,
    consecutiveErrors,
    lastErrorAt: at,
    inCooldownUntil: reachedThreshold ? at + policy.errorCooldownMs : current.inCooldownUntil,
  };
}

/** Operator override: lift an active cooldown and restart the error streak. */
export function applyCooldownOverride(state: EntityState | undefined): EntityState {
  return { ...(state ?? emptyEntityState()), consecutiveErrors: 0, inCooldownUntil: null };
}
