import test from 'node:test';
import assert from 'node:assert/strict';

import {
  applyCooldownOverride,
  applyFailure,
  applySuccess,
  classifyEntityHealth,
  isInCooldown,
  settleExpiredCooldown,
} from '../server/lib/entityState.js';
import { emptyEntityState, type EntityState } from '../server/lib/types.js';

const policy = { maxConsecutiveErrors: 5, errorCooldownMs: 1_000 };

function failTimes(count: number, start: number, state?: EntityState): EntityState {
  let current = state;
  for (let i = 0; i < count; i++) {
    current = applyFailure(current, start + i, policy);
  }
  return current ?? emptyEntityState();
}

// ---------------------------------------------------------------------------
// Failure counting
// ---------------------------------------------------------------------------

test('consecutiveErrors increases by one per failure and resets to 0 on success', () => {
  let state: EntityState | undefined;
  const seen: number[] = [];
  for (let i = 0; i < 4; i++) {
    state = applyFailure(state, 100 + i, policy);
    seen.push(state.consecutiveErrors);
  }
  assert.deepEqual(seen, [1, 2, 3, 4]);

  const recovered = applySuccess(state, 200);
  assert.equal(recovered.consecutiveErrors, 0);
  assert.equal(recovered.lastSuccessAt, 200);
  assert.equal(recovered.lastErrorAt, 103);
});

test('cooldown is set exactly on the failure that reaches the threshold', () => {
  const four = failTimes(4, 10);
  assert.equal(four.inCooldownUntil, null);

  const five = applyFailure(four, 50, policy);
  assert.equal(five.consecutiveErrors, 5);
  assert.equal(five.inCooldownUntil, 50 + policy.errorCooldownMs);
});

test('a failure inside an active cooldown keeps the original expiry', () => {
  const cooled = failTimes(5, 0);
  const again = applyFailure(cooled, 10, policy);
  assert.equal(again.consecutiveErrors, 6);
  assert.equal(again.inCooldownUntil, cooled.inCooldownUntil);
});

test('transitions never mutate their input', () => {
  const original = failTimes(2, 0);
  const copy = { ...original };
  applyFailure(original, 5, policy);
  applySuccess(original, 6);
  applyCooldownOverride(original);
  assert.deepEqual(original, copy);
});

// ---------------------------------------------------------------------------
// Cooldown expiry
// ---------------------------------------------------------------------------

test('cooldown is active strictly before inCooldownUntil and cleared exactly at it', () => {
  const cooled = failTimes(5, 0);
  const until = cooled.inCooldownUntil ?? Number.NaN;
  assert.equal(isInCooldown(cooled, until - 1), true);
  assert.equal(isInCooldown(cooled, until), false);

  const settled = settleExpiredCooldown(cooled, until);
  assert.equal(settled.inCooldownUntil, null);
  assert.equal(settled.consecutiveErrors, 0);
  assert.equal(settled.lastErrorAt, cooled.lastErrorAt);
});

test('a failure after expiry starts a fresh streak', () => {
  const cooled = failTimes(5, 0);
  const until = cooled.inCooldownUntil ?? 0;
  const next = applyFailure(cooled, until + 10, policy);
  assert.equal(next.consecutiveErrors, 1);
  assert.equal(next.inCooldownUntil, null);
});

// ---------------------------------------------------------------------------
// Health
// ---------------------------------------------------------------------------

test('classifyEntityHealth walks healthy -> degraded -> cooldown -> healthy', () => {
  assert.equal(classifyEntityHealth(emptyEntityState(), 0), 'healthy');
  const degraded = failTimes(2, 0);
  assert.equal(classifyEntityHealth(degraded, 10), 'degraded');
  const cooled = failTimes(5, 0);
  assert.equal(classifyEntityHealth(cooled, 10), 'cooldown');
  assert.equal(classifyEntityHealth(cooled, (cooled.inCooldownUntil ?? 0) + 1), 'healthy');
});

test('operator override lifts the cooldown and keeps lastSuccessAt', () => {
  const base = applySuccess(undefined, 7);
  const cooled = failTimes(5, 10, base);
  const cleared = applyCooldownOverride(cooled);
  assert.equal(cleared.inCooldownUntil, null);
  assert.equal(cleared.consecutiveErrors, 0);
  assert.equal(cleared.lastSuccessAt, 7);
});
