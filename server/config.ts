import 'dotenv/config';
import * as path from 'path';

import type { RateLimiterOptions } from './lib/rateLimiter.js';

export type StrategyName = 'resume' | 'cross-interval' | 'quota' | 'parallel';
export type MetadataBackend = 'file' | 'postgres';

export const STRATEGY_NAMES: readonly StrategyName[] = ['resume', 'cross-interval', 'quota', 'parallel'];

export const DEFAULT_INTERVALS = ['1min', '5min', '15min', '30min', '1hour', '4hour', '1day'] as const;

/**
 * Everything the scheduler reads at construction time. Built once from the
 * environment and passed down; components never read process.env themselves.
 */
export interface SchedulerConfig {
  readonly stateDir: string;
  readonly universeFile: string;
  /** Interval names in the order sequential strategies visit them. */
  readonly intervals: readonly string[];
  readonly batchSize: number;
  readonly batchSizes: Readonly<Record<string, number>>;
  readonly maxBatchesPerRun: number;
  readonly quotaTotalBatches: number;
  readonly maxConsecutiveErrors: number;
  readonly errorCooldownMs: number;
  readonly rateLimit: Readonly<RateLimiterOptions>;
  readonly fetchTimeoutMs: number;
  readonly strategy: StrategyName;
  readonly runEveryMs: number;
  readonly metadataBackend: MetadataBackend;
  readonly databaseUrl: string;
  readonly dataApiBaseUrl: string;
  readonly dataApiKey: string;
  readonly metricsTextfile: string;
}

type Env = Record<string, string | undefined>;

function parseList(raw: string | undefined): string[] {
  return String(raw || '')
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

/** `1min:5,1day:40` → { '1min': 5, '1day': 40 }. Malformed pairs are dropped. */
export function parseBatchSizes(raw: string | undefined): Record<string, number> {
  const sizes: Record<string, number> = {};
  for (const pair of parseList(raw)) {
    const [interval, size] = pair.split(':').map((part) => part.trim());
    const numeric = Math.floor(Number(size));
    if (interval && Number.isFinite(numeric) && numeric >= 1) {
      sizes[interval] = numeric;
    }
  }
  return sizes;
}

function parseStrategy(raw: string | undefined): StrategyName {
  const value = String(raw || '').trim().toLowerCase();
  return STRATEGY_NAMES.find((name) => name === value) ?? 'resume';
}

function parseBackend(raw: string | undefined): MetadataBackend {
  return String(raw || '').trim().toLowerCase() === 'postgres' ? 'postgres' : 'file';
}

export function buildSchedulerConfig(env: Env = process.env): Readonly<SchedulerConfig> {
  const intervals = parseList(env.FETCH_INTERVALS);
  const minDelayMs = Math.max(0, Number(env.RATE_LIMIT_MIN_DELAY_MS) || 250);
  const config: SchedulerConfig = {
    // --- Storage ---
    stateDir: path.resolve(String(env.SCHEDULER_STATE_DIR || '').trim() || './data/state'),
    universeFile: path.resolve(String(env.UNIVERSE_FILE || '').trim() || './data/universe.json'),
    metadataBackend: parseBackend(env.METADATA_BACKEND),
    databaseUrl: String(env.DATABASE_URL || '').trim(),

    // --- Work partitioning ---
    intervals: Object.freeze(intervals.length > 0 ? [...new Set(intervals)] : [...DEFAULT_INTERVALS]),
    batchSize: Math.max(1, Math.floor(Number(env.BATCH_SIZE) || 15)),
    batchSizes: Object.freeze(parseBatchSizes(env.BATCH_SIZES)),
    maxBatchesPerRun: Math.max(1, Math.floor(Number(env.MAX_BATCHES_PER_RUN) || 10)),
    quotaTotalBatches: Math.max(1, Math.floor(Number(env.QUOTA_TOTAL_BATCHES) || 50)),
    strategy: parseStrategy(env.SCHEDULER_STRATEGY),
    runEveryMs: Math.max(0, Number(env.SCHEDULER_RUN_EVERY_MS) || 0),

    // --- Cooldown ---
    maxConsecutiveErrors: Math.max(1, Math.floor(Number(env.MAX_CONSECUTIVE_ERRORS) || 5)),
    errorCooldownMs: Math.max(1_000, Number(env.ERROR_COOLDOWN_MS) || 24 * 60 * 60 * 1000),

    // --- Rate limiting ---
    rateLimit: Object.freeze({
      minDelayMs,
      maxDelayMs: Math.max(minDelayMs, Number(env.RATE_LIMIT_MAX_DELAY_MS) || 60_000),
      backoffFactor: Math.max(1.1, Number(env.RATE_LIMIT_BACKOFF_FACTOR) || 2),
      decayFactor: Math.min(0.99, Math.max(0.1, Number(env.RATE_LIMIT_DECAY_FACTOR) || 0.9)),
    }),
    fetchTimeoutMs: Math.max(1_000, Number(env.FETCH_TIMEOUT_MS) || 30_000),

    // --- Provider ---
    dataApiBaseUrl: String(env.DATA_API_BASE_URL || '').trim().replace(/\/+$/, ''),
    dataApiKey: String(env.DATA_API_KEY || '').trim(),

    // --- Observability ---
    metricsTextfile: String(env.METRICS_TEXTFILE || '').trim(),
  };
  return Object.freeze(config);
}

/** Items per batch for an interval: the per-interval override or the default. */
export function batchSizeFor(config: Pick<SchedulerConfig, 'batchSize' | 'batchSizes'>, interval: string): number {
  return config.batchSizes[interval] ?? config.batchSize;
}

// --- Startup validation ---
export function validateStartupEnvironment(env: Env = process.env): { warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };

  const strategy = String(env.SCHEDULER_STRATEGY || '').trim().toLowerCase();
  if (strategy && !STRATEGY_NAMES.some((name) => name === strategy)) {
    errors.push(`SCHEDULER_STRATEGY must be one of ${STRATEGY_NAMES.join(', ')} (received: ${strategy})`);
  }
  const backend = String(env.METADATA_BACKEND || '').trim().toLowerCase();
  if (backend && backend !== 'file' && backend !== 'postgres') {
    errors.push(`METADATA_BACKEND must be file or postgres (received: ${backend})`);
  }
  if (backend === 'postgres' && !String(env.DATABASE_URL || '').trim()) {
    errors.push('DATABASE_URL is required when METADATA_BACKEND is postgres');
  }
  if (!String(env.DATA_API_BASE_URL || '').trim()) {
    errors.push('DATA_API_BASE_URL is required');
  }
  if (!String(env.DATA_API_KEY || '').trim()) {
    warnings.push('DATA_API_KEY is not set');
  }
  const rawSizes = parseList(env.BATCH_SIZES);
  if (rawSizes.length > Object.keys(parseBatchSizes(env.BATCH_SIZES)).length) {
    warnings.push(`BATCH_SIZES contains malformed entries (received: ${String(env.BATCH_SIZES)})`);
  }
  const minDelay = Number(env.RATE_LIMIT_MIN_DELAY_MS);
  const maxDelay = Number(env.RATE_LIMIT_MAX_DELAY_MS);
  if (Number.isFinite(minDelay) && Number.isFinite(maxDelay) && env.RATE_LIMIT_MIN_DELAY_MS && env.RATE_LIMIT_MAX_DELAY_MS) {
    if (maxDelay < minDelay) {
      warnings.push('RATE_LIMIT_MAX_DELAY_MS is below RATE_LIMIT_MIN_DELAY_MS; the minimum is used for both');
    }
  }

  [
    'BATCH_SIZE',
    'MAX_BATCHES_PER_RUN',
    'QUOTA_TOTAL_BATCHES',
    'MAX_CONSECUTIVE_ERRORS',
    'ERROR_COOLDOWN_MS',
    'RATE_LIMIT_MAX_DELAY_MS',
    'RATE_LIMIT_BACKOFF_FACTOR',
    'RATE_LIMIT_DECAY_FACTOR',
    'FETCH_TIMEOUT_MS',
  ].forEach(warnIfInvalidPositiveNumber);

  for (const warning of warnings) {
    console.warn(`[startup-env] ${warning}`);
  }
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[startup-env] ${error}`);
    }
    throw new Error('Startup environment validation failed');
  }
  return { warnings };
}
