import test from 'node:test';
import assert from 'node:assert/strict';

import { RunState } from '../server/lib/RunState.js';

const STARTED = new Date(Date.UTC(2026, 2, 2, 9, 30));
const FINISHED = new Date(Date.UTC(2026, 2, 2, 9, 45));

test('RunState initial state has expected defaults', () => {
  const s = new RunState('scheduler');
  assert.equal(s.name, 'scheduler');
  assert.equal(s.isRunning, false);
  assert.equal(s.isStopping, false);
  assert.equal(s.shouldStop, false);
  assert.equal(s.signal, null);
  assert.deepEqual(s.readStatus(), {
    running: false,
    status: 'idle',
    strategy: null,
    currentInterval: null,
    totalItems: 0,
    processedItems: 0,
    errorItems: 0,
    startedAt: null,
    finishedAt: null,
  });
});

test('beginRun returns an AbortController and records the strategy', () => {
  const s = new RunState('scheduler');
  const ac = s.beginRun('quota', STARTED);
  assert.equal(s.isRunning, true);
  assert.equal(s.signal, ac.signal);
  const status = s.readStatus();
  assert.equal(status.status, 'running');
  assert.equal(status.strategy, 'quota');
  assert.equal(status.startedAt, '2026-03-02T09:30:00.000Z');
});

test('beginRun throws while a run is active', () => {
  const s = new RunState('scheduler');
  s.beginRun('resume');
  assert.throws(() => s.beginRun('resume'), /scheduler is already running/);
});

test('beginRun resets counters and the stop flag from the previous run', () => {
  const s = new RunState('scheduler');
  const first = s.beginRun('resume');
  s.updateProgress({ total: 4, processed: 4, errors: 1 });
  s.requestStop();
  s.markStopped();
  s.cleanup(first);

  s.beginRun('resume');
  assert.equal(s.isStopping, false);
  assert.equal(s.shouldStop, false);
  assert.equal(s.readStatus().processedItems, 0);
});

test('requestStop returns false if not running', () => {
  assert.equal(new RunState('scheduler').requestStop(), false);
});

test('requestStop aborts the controller and sets status to stopping', () => {
  const s = new RunState('scheduler');
  const ac = s.beginRun('parallel');
  assert.equal(s.requestStop(), true);
  assert.equal(ac.signal.aborted, true);
  assert.equal(s.shouldStop, true);
  assert.equal(s.readStatus().status, 'stopping');

  s.updateProgress({ processed: 1 });
  assert.equal(s.readStatus().status, 'stopping');
});

test('shouldStop is true if the AbortController is aborted externally', () => {
  const s = new RunState('scheduler');
  s.beginRun('resume').abort();
  assert.equal(s.shouldStop, true);
  assert.equal(s.isStopping, false);
});

test('setStatus merges and readStatus returns a copy', () => {
  const s = new RunState('scheduler');
  s.beginRun('cross-interval');
  s.setStatus({ currentInterval: '5min' });
  const snapshot = s.readStatus();
  assert.equal(snapshot.currentInterval, '5min');
  assert.equal(snapshot.strategy, 'cross-interval');
  snapshot.currentInterval = 'mutated';
  assert.equal(s.readStatus().currentInterval, '5min');
});

test('updateProgress accumulates counters', () => {
  const s = new RunState('scheduler');
  s.beginRun('resume');
  s.updateProgress({ total: 10 });
  s.updateProgress({ processed: 3, errors: 1 });
  s.updateProgress({ processed: 2 });
  const status = s.readStatus();
  assert.equal(status.totalItems, 10);
  assert.equal(status.processedItems, 5);
  assert.equal(status.errorItems, 1);
});

test('markCompleted distinguishes runs with failed items', () => {
  const clean = new RunState('scheduler');
  clean.beginRun('resume');
  clean.setStatus({ currentInterval: '1day' });
  clean.markCompleted(FINISHED);
  assert.equal(clean.readStatus().status, 'completed');
  assert.equal(clean.readStatus().currentInterval, null);
  assert.equal(clean.readStatus().finishedAt, '2026-03-02T09:45:00.000Z');

  const withErrors = new RunState('scheduler');
  withErrors.beginRun('resume');
  withErrors.updateProgress({ processed: 2, errors: 1 });
  withErrors.markCompleted(FINISHED);
  assert.equal(withErrors.readStatus().status, 'completed-with-errors');
});

test('markStopped and markFailed are terminal and clear the stop flag', () => {
  const s = new RunState('scheduler');
  s.beginRun('resume');
  s.requestStop();
  s.markStopped(FINISHED);
  assert.equal(s.isStopping, false);
  assert.equal(s.readStatus().status, 'stopped');
  assert.equal(s.readStatus().running, false);

  const failed = new RunState('scheduler');
  failed.beginRun('resume');
  failed.markFailed(FINISHED);
  assert.equal(failed.readStatus().status, 'failed');
});

test('cleanup only clears the controller it was handed', () => {
  const s = new RunState('scheduler');
  s.beginRun('resume');
  s.cleanup(new AbortController());
  assert.equal(s.isRunning, false);
  assert.notEqual(s.signal, null);

  const other = new RunState('scheduler');
  const ac = other.beginRun('resume');
  other.cleanup(ac);
  assert.equal(other.signal, null);
});
