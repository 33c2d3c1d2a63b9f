import test from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import * as path from 'path';

import { ProgressStateStore, assertValidPassId, passIdForInterval } from '../server/data/progressStateStore.js';
import { ActivePassExistsError, PersistenceError } from '../server/lib/errors.js';
import type { WorkItem } from '../server/lib/types.js';
import { FakeClock, makeTempStateDir, removeDir } from './support/fakes.js';

const items = (interval: string, ...entities: string[]): WorkItem[] => entities.map((entity) => ({ entity, interval }));

test('startPass persists pending in order and drops duplicates', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));
  const clock = new FakeClock();
  const store = new ProgressStateStore(dir, { clock: clock.now });

  const cursor = await store.startPass('pass-1day', '1day', items('1day', 'B', 'A', 'B', 'C'));
  assert.deepEqual(
    cursor.pending.map((item) => item.entity),
    ['B', 'A', 'C'],
  );
  assert.deepEqual(cursor.attempted, []);
  assert.equal(cursor.createdAt, clock.nowMs);

  const onDisk = JSON.parse(await fs.readFile(path.join(dir, 'progress', 'pass-1day.json'), 'utf8'));
  assert.equal(onDisk.version, 1);
  assert.equal(onDisk.passId, 'pass-1day');
  assert.equal(onDisk.pending.length, 3);
});

test('startPass refuses to overwrite an incomplete cursor', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));
  const store = new ProgressStateStore(dir);

  await store.startPass('pass-5min', '5min', items('5min', 'AAPL'));
  await assert.rejects(
    () => store.startPass('pass-5min', '5min', items('5min', 'MSFT')),
    (err: unknown) => err instanceof ActivePassExistsError && err.passId === 'pass-5min',
  );
  const cursor = await store.resumePass('pass-5min');
  assert.deepEqual(cursor?.pending, items('5min', 'AAPL'));
});

test('markAttempted moves exactly one item and a fresh store resumes from it', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));
  const store = new ProgressStateStore(dir);

  let cursor = await store.startPass('pass-1hour', '1hour', items('1hour', 'A', 'B', 'C'));
  cursor = await store.markAttempted(cursor, { entity: 'B', interval: '1hour' });
  assert.deepEqual(cursor.pending, items('1hour', 'A', 'C'));
  assert.deepEqual(cursor.attempted, items('1hour', 'B'));

  const resumed = await new ProgressStateStore(dir).resumePass('pass-1hour');
  assert.deepEqual(resumed, cursor);

  await assert.rejects(() => store.markAttempted(cursor, { entity: 'B', interval: '1hour' }), /is not pending in pass pass-1hour/);
});

test('resumePass returns null when no cursor exists', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));
  assert.equal(await new ProgressStateStore(dir).resumePass('pass-1week'), null);
});

test('a corrupt cursor is a PersistenceError', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));
  await fs.mkdir(path.join(dir, 'progress'), { recursive: true });
  await fs.writeFile(path.join(dir, 'progress', 'pass-1day.json'), '{"version":1,"passId":"pass-1day"}');
  await assert.rejects(() => new ProgressStateStore(dir).resumePass('pass-1day'), PersistenceError);
});

test('completePass archives the cursor and clears the active set', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));
  const clock = new FakeClock(1_800_000_000_000);
  const store = new ProgressStateStore(dir, { clock: clock.now });

  let cursor = await store.startPass('pass-15min', '15min', items('15min', 'SPY'));
  await assert.rejects(() => store.completePass(cursor), /still has 1 pending item/);
  cursor = await store.markAttempted(cursor, { entity: 'SPY', interval: '15min' });

  const archived = await store.completePass(cursor);
  assert.equal(archived, path.join(dir, 'progress', 'archive', 'pass-15min-1800000000000.json'));
  assert.equal(await store.resumePass('pass-15min'), null);
  assert.deepEqual(await store.listActivePasses(), []);

  const restarted = await store.startPass('pass-15min', '15min', items('15min', 'QQQ'));
  assert.equal(restarted.pending.length, 1);
});

test('listActivePasses returns sorted pass ids and ignores temp files', async (t) => {
  const dir = await makeTempStateDir();
  t.after(() => removeDir(dir));
  const store = new ProgressStateStore(dir);
  assert.deepEqual(await store.listActivePasses(), []);

  await store.startPass('pass-5min', '5min', items('5min', 'A'));
  await store.startPass('pass-1day', '1day', items('1day', 'A'));
  await fs.writeFile(path.join(dir, 'progress', '.pass-1min.json.123.tmp'), '{}');
  assert.deepEqual(await store.listActivePasses(), ['pass-1day', 'pass-5min']);
});

test('pass ids are validated before touching the filesystem', () => {
  assert.equal(passIdForInterval('4hour'), 'pass-4hour');
  assert.doesNotThrow(() => assertValidPassId('pass-1min'));
  assert.throws(() => assertValidPassId('../escape'), /Invalid pass id/);
  assert.throws(() => assertValidPassId(''), /Invalid pass id/);
});
