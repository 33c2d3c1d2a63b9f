import test from 'node:test';
import assert from 'node:assert/strict';

import { scoreWorkItems } from '../server/lib/priorityScorer.js';
import type { EntityState } from '../server/lib/types.js';
import { DAY_MS } from './support/fakes.js';

const NOW = Date.UTC(2026, 2, 1);

function state(partial: Partial<EntityState>): EntityState {
  return { lastSuccessAt: null, consecutiveErrors: 0, lastErrorAt: null, inCooldownUntil: null, ...partial };
}

test('stale ticker, never-fetched ticker and cooled-down ticker score as [B, A]', () => {
  const snapshot = new Map<string, EntityState>([
    ['A', state({ lastSuccessAt: NOW - 10 * DAY_MS })],
    ['C', state({ consecutiveErrors: 5, inCooldownUntil: NOW + DAY_MS })],
  ]);
  const items = scoreWorkItems(['A', 'B', 'C'], '1day', snapshot, NOW);
  assert.deepEqual(items, [
    { entity: 'B', interval: '1day' },
    { entity: 'A', interval: '1day' },
  ]);
});

test('distinct timestamps order strictly ascending with never-fetched first', () => {
  const snapshot = new Map<string, EntityState>([
    ['W', state({ lastSuccessAt: NOW - 1 })],
    ['X', state({ lastSuccessAt: NOW - 300 })],
    ['Y', state({ lastSuccessAt: NOW - 20 })],
  ]);
  const items = scoreWorkItems(['W', 'X', 'Y', 'Z'], '5min', snapshot, NOW);
  assert.deepEqual(
    items.map((item) => item.entity),
    ['Z', 'X', 'Y', 'W'],
  );
});

test('ties keep input order', () => {
  const snapshot = new Map<string, EntityState>([
    ['B', state({ lastSuccessAt: 50 })],
    ['A', state({ lastSuccessAt: 50 })],
  ]);
  const items = scoreWorkItems(['D', 'B', 'C', 'A'], '1min', snapshot, NOW);
  assert.deepEqual(
    items.map((item) => item.entity),
    ['D', 'C', 'B', 'A'],
  );
});

test('cooldown excludes the ticker regardless of staleness; expired cooldown does not', () => {
  const snapshot = new Map<string, EntityState>([
    ['OLD', state({ lastSuccessAt: 1, consecutiveErrors: 5, inCooldownUntil: NOW + 1 })],
    ['DONE', state({ lastSuccessAt: NOW - 5, consecutiveErrors: 5, inCooldownUntil: NOW })],
  ]);
  const items = scoreWorkItems(['OLD', 'DONE'], '1hour', snapshot, NOW);
  assert.deepEqual(items, [{ entity: 'DONE', interval: '1hour' }]);
});

test('duplicate tickers are scored once at their first position', () => {
  const items = scoreWorkItems(['A', 'B', 'A'], '1day', new Map(), NOW);
  assert.deepEqual(
    items.map((item) => item.entity),
    ['A', 'B'],
  );
});

test('scoring is pure and repeatable', () => {
  const snapshot = new Map<string, EntityState>([['A', state({ lastSuccessAt: 3 })]]);
  const entities = ['A', 'B'];
  const first = scoreWorkItems(entities, '1day', snapshot, NOW);
  const second = scoreWorkItems(entities, '1day', snapshot, NOW);
  assert.deepEqual(first, second);
  assert.deepEqual(entities, ['A', 'B']);
  assert.equal(snapshot.size, 1);
});
