import client from 'prom-client';

import { writeFileAtomic } from './lib/atomicFile.js';

// Collect default metrics (memory, CPU, event loop, etc.)
client.collectDefaultMetrics({
  labels: { app: 'bar-refresh-scheduler' },
});

export const fetchAttemptsTotal = new client.Counter({
  name: 'scheduler_fetch_attempts_total',
  help: 'Fetch attempts by interval and outcome',
  labelNames: ['interval', 'outcome'],
});

export const fetchDurationSeconds = new client.Histogram({
  name: 'scheduler_fetch_duration_seconds',
  help: 'Duration of fetch attempts in seconds',
  labelNames: ['interval'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
});

export const rateLimitDelayMs = new client.Gauge({
  name: 'scheduler_rate_limit_delay_ms',
  help: 'Current adaptive spacing between fetches per interval class',
  labelNames: ['interval_class'],
});

export const batchesTotal = new client.Counter({
  name: 'scheduler_batches_total',
  help: 'Batches executed by interval',
  labelNames: ['interval'],
});

export const metricsRegistry = client.register;

/** Dump the registry in Prometheus text format for a node_exporter textfile collector. */
export async function writeMetricsTextfile(filePath: string): Promise<void> {
  await writeFileAtomic(filePath, await metricsRegistry.metrics());
}
