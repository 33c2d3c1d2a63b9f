import test from 'node:test';
import assert from 'node:assert/strict';
import { DummyDriver } from 'kysely';
import pino from 'pino';

import { PostgresEntityMetadataStore } from '../server/data/postgresEntityMetadataStore.js';
import { createQueryMonitor } from '../server/lib/dbMonitor.js';
import { PersistenceError } from '../server/lib/errors.js';
import { TEST_POLICY } from './support/fakes.js';
import { createTestDb, FailingDriver } from './support/kysely.js';

const SELECT_SQL =
  'select "ticker", "interval", "last_success_at", "consecutive_errors", "last_error_at", "in_cooldown_until" from "entity_state"';

interface LogRecord {
  level: number;
  msg: string;
  pool: string;
  sql: string;
  durationMs: number;
  error?: string;
}

function captureLogger() {
  const records: LogRecord[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (line: string) => {
        records.push(JSON.parse(line));
      },
    },
  );
  return { logger, records };
}

test('queries at or above the threshold through the store log a slow-query warning', async () => {
  const { logger, records } = captureLogger();
  const db = createTestDb(new DummyDriver(), createQueryMonitor('metadata', { slowQueryThresholdMs: 0, logger }));
  await new PostgresEntityMetadataStore(db, TEST_POLICY).load();

  assert.equal(records.length, 1);
  assert.equal(records[0].level, 40);
  assert.equal(records[0].msg, '[slow-query]');
  assert.equal(records[0].pool, 'metadata');
  assert.equal(records[0].sql, SELECT_SQL);
  assert.equal(typeof records[0].durationMs, 'number');
});

test('queries under the threshold log nothing', async () => {
  const { logger, records } = captureLogger();
  const db = createTestDb(new DummyDriver(), createQueryMonitor('metadata', { slowQueryThresholdMs: 60_000, logger }));
  const store = new PostgresEntityMetadataStore(db, TEST_POLICY);
  await store.load();
  await store.recordSuccess('AAPL', '1day', Date.UTC(2026, 4, 1));
  assert.deepEqual(records, []);
});

test('failed queries log a query-error with the driver message', async () => {
  const { logger, records } = captureLogger();
  const db = createTestDb(new FailingDriver(), createQueryMonitor('metadata', { slowQueryThresholdMs: 60_000, logger }));
  await assert.rejects(() => new PostgresEntityMetadataStore(db, TEST_POLICY).load(), PersistenceError);

  assert.equal(records.length, 1);
  assert.equal(records[0].level, 50);
  assert.equal(records[0].msg, '[query-error]');
  assert.equal(records[0].sql, SELECT_SQL);
  assert.equal(records[0].error, 'connection refused');
});
