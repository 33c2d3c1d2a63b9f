import test from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import * as path from 'path';

import { ENTITY_METADATA_FILE_NAME, FileEntityMetadataStore } from '../server/data/entityMetadataStore.js';
import { PersistenceError } from '../server/lib/errors.js';
import { scoreWorkItems } from '../server/lib/priorityScorer.js';
import { DAY_MS, TEST_POLICY, makeTempStateDir, removeDir } from './support/fakes.js';

const NOW = Date.UTC(2026, 3, 10, 14, 30);

test('records survive a reload from disk', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));

  const store = new FileEntityMetadataStore(dir, TEST_POLICY);
  await store.load();
  await store.recordSuccess('AAPL', '1day', NOW - DAY_MS);
  await store.recordFailure('MSFT', '5min', NOW);

  const reloaded = new FileEntityMetadataStore(dir, TEST_POLICY);
  await reloaded.load();
  assert.deepEqual(reloaded.get('AAPL', '1day'), {
    lastSuccessAt: NOW - DAY_MS,
    consecutiveErrors: 0,
    lastErrorAt: null,
    inCooldownUntil: null,
  });
  assert.equal(reloaded.get('MSFT', '5min')?.consecutiveErrors, 1);
  assert.deepEqual(reloaded.intervals().sort(), ['1day', '5min']);
});

test('five consecutive failures put the ticker in cooldown and scoring skips it', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));

  const store = new FileEntityMetadataStore(dir, TEST_POLICY);
  await store.load();
  let last = await store.recordFailure('TSLA', '1hour', NOW);
  for (let i = 1; i < 5; i++) {
    assert.equal(last.inCooldownUntil, null);
    last = await store.recordFailure('TSLA', '1hour', NOW + i);
  }
  assert.equal(last.consecutiveErrors, 5);
  assert.equal(last.inCooldownUntil, NOW + 4 + DAY_MS);

  const sixthAttemptAt = NOW + 60_000;
  const items = scoreWorkItems(['TSLA', 'NVDA'], '1hour', store.snapshot('1hour', sixthAttemptAt), sixthAttemptAt);
  assert.deepEqual(items, [{ entity: 'NVDA', interval: '1hour' }]);
});

test('snapshot settles expired cooldowns without touching the stored record', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));

  const store = new FileEntityMetadataStore(dir, { maxConsecutiveErrors: 1, errorCooldownMs: 1_000 });
  await store.load();
  await store.recordFailure('AMD', '1day', NOW);

  const snapshot = store.snapshot('1day', NOW + 1_000);
  assert.equal(snapshot.get('AMD')?.inCooldownUntil, null);
  assert.equal(snapshot.get('AMD')?.consecutiveErrors, 0);
  assert.equal(store.get('AMD', '1day')?.inCooldownUntil, NOW + 1_000);
});

test('clearCooldown lifts an active cooldown', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));

  const store = new FileEntityMetadataStore(dir, { maxConsecutiveErrors: 1, errorCooldownMs: DAY_MS });
  await store.load();
  await store.recordFailure('AMD', '1day', NOW);
  const cleared = await store.clearCooldown('AMD', '1day');
  assert.equal(cleared.inCooldownUntil, null);
  assert.equal(cleared.lastErrorAt, NOW);
});

test('concurrent writers across intervals all land in the file', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));

  const store = new FileEntityMetadataStore(dir, TEST_POLICY);
  await store.load();
  const tickers = ['A', 'B', 'C', 'D', 'E', 'F'];
  await Promise.all(
    tickers.flatMap((ticker, i) => [
      store.recordSuccess(ticker, '1min', NOW + i),
      store.recordFailure(ticker, '1day', NOW + i),
    ]),
  );

  const reloaded = new FileEntityMetadataStore(dir, TEST_POLICY);
  await reloaded.load();
  for (const [i, ticker] of tickers.entries()) {
    assert.equal(reloaded.get(ticker, '1min')?.lastSuccessAt, NOW + i);
    assert.equal(reloaded.get(ticker, '1day')?.consecutiveErrors, 1);
  }
});

test('an invalid metadata file fails load with PersistenceError', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));
  await fs.writeFile(path.join(dir, ENTITY_METADATA_FILE_NAME), JSON.stringify({ version: 2, intervals: {} }));

  const store = new FileEntityMetadataStore(dir, TEST_POLICY);
  await assert.rejects(() => store.load(), PersistenceError);
});

test('a failed write rejects with PersistenceError and leaves memory unchanged', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));
  const blocker = path.join(dir, 'blocker');
  await fs.writeFile(blocker, 'not a directory');

  const store = new FileEntityMetadataStore(path.join(blocker, 'state'), TEST_POLICY);
  await assert.rejects(() => store.recordSuccess('AAPL', '1day', NOW), PersistenceError);
  assert.equal(store.get('AAPL', '1day'), undefined);
});
