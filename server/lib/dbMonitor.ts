/**
 * Database query monitoring — a Kysely log handler that times every query
 * and logs slow queries and query errors through the scheduler logger.
 */

import type { LogEvent } from 'kysely';

import baseLogger, { type Logger } from '../logger.js';

const SLOW_QUERY_THRESHOLD_MS = Math.max(0, Number(process.env.SLOW_QUERY_THRESHOLD_MS) || 500);

export interface QueryMonitorOptions {
  slowQueryThresholdMs?: number;
  logger?: Logger;
}

function compactSql(sql: string): string {
  return sql.replace(/\s+/g, ' ').trim().slice(0, 200);
}

export function createQueryMonitor(poolName = 'primary', options: QueryMonitorOptions = {}): (event: LogEvent) => void {
  const thresholdMs = options.slowQueryThresholdMs ?? SLOW_QUERY_THRESHOLD_MS;
  const log = options.logger ?? baseLogger;

  return function monitorQuery(event: LogEvent): void {
    const durationMs = Math.round(event.queryDurationMillis);
    const sql = compactSql(event.query.sql);
    if (event.level === 'error') {
      log.error(
        {
          pool: poolName,
          durationMs,
          sql,
          error: event.error instanceof Error ? event.error.message : String(event.error),
        },
        '[query-error]',
      );
      return;
    }
    if (event.queryDurationMillis >= thresholdMs) {
      log.warn({ pool: poolName, durationMs, sql }, '[slow-query]');
    }
  };
}
