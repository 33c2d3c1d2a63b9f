import test from 'node:test';
import assert from 'node:assert/strict';

import { CircuitBreaker, CircuitOpenError, type CircuitState } from '../server/lib/circuitBreaker.js';
import { FakeClock } from './support/fakes.js';

const fail = async (): Promise<never> => {
  throw new Error('upstream down');
};

function createBreaker(options: { isInfraError?: (err: unknown) => boolean } = {}) {
  const clock = new FakeClock();
  const transitions: Array<[CircuitState, CircuitState]> = [];
  const breaker = new CircuitBreaker({
    failureThreshold: 3,
    cooldownMs: 10_000,
    clock: clock.now,
    isInfraError: options.isInfraError,
    onStateChange: (from, to) => transitions.push([from, to]),
  });
  return { breaker, clock, transitions };
}

test('opens after the failure threshold and rejects without calling', async () => {
  const { breaker, transitions } = createBreaker();
  for (let i = 0; i < 3; i++) {
    await assert.rejects(() => breaker.call(fail), /upstream down/);
  }
  assert.equal(breaker.getState(), 'OPEN');

  let called = false;
  await assert.rejects(
    () =>
      breaker.call(async () => {
        called = true;
      }),
    (err: unknown) => err instanceof CircuitOpenError && err.cooldownRemainingMs === 10_000,
  );
  assert.equal(called, false);
  assert.deepEqual(transitions, [['CLOSED', 'OPEN']]);
});

test('a success resets the failure streak', async () => {
  const { breaker } = createBreaker();
  await assert.rejects(() => breaker.call(fail));
  await assert.rejects(() => breaker.call(fail));
  assert.equal(await breaker.call(async () => 'ok'), 'ok');
  await assert.rejects(() => breaker.call(fail));
  assert.deepEqual(breaker.getInfo(), { state: 'CLOSED', consecutiveFailures: 1, cooldownRemainingMs: 0 });
});

test('half-open probe: success closes, failure reopens immediately', async () => {
  const { breaker, clock, transitions } = createBreaker();
  for (let i = 0; i < 3; i++) await assert.rejects(() => breaker.call(fail));

  clock.advance(4_000);
  assert.deepEqual(breaker.getInfo(), { state: 'OPEN', consecutiveFailures: 3, cooldownRemainingMs: 6_000 });
  clock.advance(6_000);
  assert.equal(breaker.getState(), 'HALF_OPEN');
  await assert.rejects(() => breaker.call(fail));
  assert.equal(breaker.getState(), 'OPEN');

  clock.advance(10_000);
  assert.equal(await breaker.call(async () => 42), 42);
  assert.equal(breaker.getState(), 'CLOSED');
  assert.deepEqual(transitions, [
    ['CLOSED', 'OPEN'],
    ['OPEN', 'HALF_OPEN'],
    ['HALF_OPEN', 'OPEN'],
    ['OPEN', 'HALF_OPEN'],
    ['HALF_OPEN', 'CLOSED'],
  ]);
});

test('errors that are not outages never count', async () => {
  const { breaker } = createBreaker({ isInfraError: () => false });
  for (let i = 0; i < 10; i++) await assert.rejects(() => breaker.call(fail));
  assert.equal(breaker.getState(), 'CLOSED');
});

test('reset closes an open breaker', async () => {
  const { breaker } = createBreaker();
  for (let i = 0; i < 3; i++) await assert.rejects(() => breaker.call(fail));
  breaker.reset();
  assert.deepEqual(breaker.getInfo(), { state: 'CLOSED', consecutiveFailures: 0, cooldownRemainingMs: 0 });
});
