import type { EntityMetadataStore } from '../data/entityMetadataStore.js';
import type { ProgressCursor, ProgressStateStore } from '../data/progressStateStore.js';
import { runWithAbortAndTimeout, sleepWithAbort, type Sleep } from '../lib/abort.js';
import type { BarFetcher, FetchOutcome } from '../lib/barFetcher.js';
import {
  FetchError,
  errorMessage,
  isAbortError,
  isTaskTimeoutError,
  type FetchErrorKind,
  type FetchFailureClass,
} from '../lib/errors.js';
import type { AdaptiveRateLimiter } from '../lib/rateLimiter.js';
import type { EntityState, TimeSeries, WorkItem } from '../lib/types.js';
import baseLogger, { type Logger } from '../logger.js';
import { batchesTotal, fetchAttemptsTotal, fetchDurationSeconds, rateLimitDelayMs } from '../metrics.js';

export type SeriesSink = (item: WorkItem, series: TimeSeries) => Promise<void>;

export interface BatchExecutorDeps {
  fetcher: BarFetcher;
  metadata: EntityMetadataStore;
  progress: ProgressStateStore;
  rateLimiter: AdaptiveRateLimiter;
  fetchTimeoutMs: number;
  /** Receives every fetched series; a rejection fails that item as transient. */
  onSeries?: SeriesSink;
  /** Rate-limit class for an interval. Defaults to the interval name. */
  intervalClassOf?: (interval: string) => string;
  clock?: () => number;
  sleep?: Sleep;
  logger?: Logger;
}

export interface ItemOutcome {
  item: WorkItem;
  ok: boolean;
  kind: FetchErrorKind | null;
  failureClass: FetchFailureClass | null;
  entityState: EntityState;
}

export interface BatchResult {
  attempted: number;
  successes: number;
  /** All failed items, retryable and permanent. */
  failures: number;
  permanentFailures: number;
  /** True when the batch ended early because its signal fired. */
  stopped: boolean;
  cursor: ProgressCursor;
  outcomes: ItemOutcome[];
}

export interface RunBatchOptions {
  /** Checked between items and while waiting for rate-limit spacing; never interrupts a fetch. */
  signal?: AbortSignal | null;
}

/**
 * Executes one batch of a pass: for each pending item, wait out the rate
 * limiter, fetch with a timeout, record the outcome in entity metadata and
 * the limiter, then commit the item to the progress cursor.
 *
 * Per-item failures are recorded and never escape. Store failures
 * (PersistenceError) propagate and end the batch.
 */
/** Operator-facing reason for a permanent failure; a 4xx status means the request itself was refused. */
export function describePermanentFailure(error: FetchError): string {
  if (error.kind === 'not-found') return 'ticker unknown to provider';
  if (error.httpStatus !== null && error.httpStatus >= 400) {
    return `provider rejected the request (HTTP ${error.httpStatus})`;
  }
  return 'provider payload failed validation';
}

export class BatchExecutor {
  private readonly deps: BatchExecutorDeps;
  private readonly clock: () => number;
  private readonly sleep: Sleep;
  private readonly log: Logger;
  private readonly intervalClassOf: (interval: string) => string;

  constructor(deps: BatchExecutorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep ?? sleepWithAbort;
    this.log = deps.logger ?? baseLogger;
    this.intervalClassOf = deps.intervalClassOf ?? ((interval) => interval);
  }

  get rateLimiter(): AdaptiveRateLimiter {
    return this.deps.rateLimiter;
  }

  async runBatch(cursor: ProgressCursor, batchSize: number, options: RunBatchOptions = {}): Promise<BatchResult> {
    const signal = options.signal ?? null;
    const items = cursor.pending.slice(0, Math.max(1, Math.floor(batchSize)));
    const result: BatchResult = {
      attempted: 0,
      successes: 0,
      failures: 0,
      permanentFailures: 0,
      stopped: false,
      cursor,
      outcomes: [],
    };

    for (const item of items) {
      if (signal?.aborted) {
        result.stopped = true;
        break;
      }
      const intervalClass = this.intervalClassOf(item.interval);
      const waitMs = this.deps.rateLimiter.remainingWait(intervalClass, this.clock());
      if (waitMs > 0) {
        try {
          await this.sleep(waitMs, signal);
        } catch (err: unknown) {
          if (!isAbortError(err)) throw err;
          result.stopped = true;
          break;
        }
      }

      const outcome = await this.attemptItem(item, intervalClass);
      result.cursor = await this.deps.progress.markAttempted(result.cursor, item);
      result.attempted += 1;
      result.outcomes.push(outcome);
      if (outcome.ok) {
        result.successes += 1;
      } else {
        result.failures += 1;
        if (outcome.failureClass === 'permanent') result.permanentFailures += 1;
      }
    }

    batchesTotal.inc({ interval: cursor.interval });
    this.log.info(
      {
        passId: cursor.passId,
        interval: cursor.interval,
        attempted: result.attempted,
        successes: result.successes,
        failures: result.failures,
        pending: result.cursor.pending.length,
        stopped: result.stopped,
      },
      '[executor] batch finished',
    );
    return result;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private async attemptItem(item: WorkItem, intervalClass: string): Promise<ItemOutcome> {
    const { metadata, rateLimiter } = this.deps;
    const startedAt = this.clock();
    rateLimiter.markAttempt(intervalClass, startedAt);
    const since = metadata.get(item.entity, item.interval)?.lastSuccessAt ?? null;

    const outcome = await this.fetchWithTimeout(item, since);
    const finishedAt = this.clock();
    fetchDurationSeconds.observe({ interval: item.interval }, Math.max(0, finishedAt - startedAt) / 1000);

    if (outcome.ok) {
      const entityState = await metadata.recordSuccess(item.entity, item.interval, finishedAt);
      rateLimiter.recordOutcome(intervalClass, true);
      this.recordMetrics(item, 'success', intervalClass);
      this.log.debug({ entity: item.entity, interval: item.interval, bars: outcome.series.bars.length }, '[executor] fetched');
      return { item, ok: true, kind: null, failureClass: null, entityState };
    }

    const { error } = outcome;
    const failureClass = error.failureClass;
    const entityState = await metadata.recordFailure(item.entity, item.interval, finishedAt);
    if (failureClass === 'retryable') {
      rateLimiter.recordOutcome(intervalClass, false);
      this.log.warn(
        {
          entity: item.entity,
          interval: item.interval,
          kind: error.kind,
          consecutiveErrors: entityState.consecutiveErrors,
          delayMs: rateLimiter.delayFor(intervalClass),
          error: error.message,
        },
        '[executor] retryable fetch failure',
      );
    } else {
      this.log.warn(
        {
          entity: item.entity,
          interval: item.interval,
          kind: error.kind,
          consecutiveErrors: entityState.consecutiveErrors,
          diagnostic: describePermanentFailure(error),
          error: error.message,
        },
        '[executor] permanent fetch failure',
      );
    }
    if (entityState.inCooldownUntil !== null && entityState.inCooldownUntil > finishedAt) {
      this.log.warn(
        {
          entity: item.entity,
          interval: item.interval,
          inCooldownUntil: new Date(entityState.inCooldownUntil).toISOString(),
        },
        '[executor] ticker entered cooldown',
      );
    }
    this.recordMetrics(item, error.kind, intervalClass);
    return { item, ok: false, kind: error.kind, failureClass, entityState };
  }

  private async fetchWithTimeout(item: WorkItem, since: number | null): Promise<FetchOutcome> {
    const label = `Fetch ${item.interval} ${item.entity}`;
    try {
      const outcome = await runWithAbortAndTimeout(
        (fetchSignal) => this.deps.fetcher.fetchBars(item.entity, item.interval, since, fetchSignal),
        { label, timeoutMs: this.deps.fetchTimeoutMs },
      );
      if (outcome.ok && this.deps.onSeries) {
        try {
          await this.deps.onSeries(item, outcome.series);
        } catch (err: unknown) {
          return {
            ok: false,
            error: new FetchError('transient', `${label}: series hand-off failed: ${errorMessage(err)}`, { cause: err }),
          };
        }
      }
      return outcome;
    } catch (err: unknown) {
      const message = isTaskTimeoutError(err) ? err.message : `${label} threw: ${errorMessage(err)}`;
      return { ok: false, error: new FetchError('transient', message, { cause: err }) };
    }
  }

  private recordMetrics(item: WorkItem, outcome: string, intervalClass: string): void {
    fetchAttemptsTotal.inc({ interval: item.interval, outcome });
    rateLimitDelayMs.set({ interval_class: intervalClass }, this.deps.rateLimiter.delayFor(intervalClass));
  }
}
