import { batchSizeFor, type SchedulerConfig } from '../config.js';
import type { EntityMetadataStore } from '../data/entityMetadataStore.js';
import { passIdForInterval, type ProgressCursor, type ProgressStateStore } from '../data/progressStateStore.js';
import type { TickerUniverse } from '../data/universe.js';
import { scoreWorkItems } from '../lib/priorityScorer.js';
import type { AdaptiveRateLimiter } from '../lib/rateLimiter.js';
import type { RunState } from '../lib/RunState.js';
import type { Logger } from '../logger.js';
import type { BatchExecutor, BatchResult } from '../services/batchExecutor.js';

/**
 * Everything a strategy needs. Built once per process by createSchedulerContext;
 * strategies differ only in how they sequence intervals through IntervalPass.
 */
export interface SchedulerContext {
  config: Pick<
    SchedulerConfig,
    'intervals' | 'batchSize' | 'batchSizes' | 'maxBatchesPerRun' | 'quotaTotalBatches' | 'rateLimit'
  >;
  universe: TickerUniverse;
  metadata: EntityMetadataStore;
  progress: ProgressStateStore;
  /** Executor over the shared rate limiter, used by sequential strategies. */
  executor: BatchExecutor;
  /** Executor over a private rate limiter, used by parallel workers. */
  createExecutor: (rateLimiter: AdaptiveRateLimiter) => BatchExecutor;
  clock: () => number;
  logger: Logger;
}

export type IntervalPassStatus = 'completed' | 'paused' | 'stopped' | 'empty';

export interface IntervalPassResult {
  interval: string;
  passId: string;
  status: IntervalPassStatus;
  resumed: boolean;
  batches: number;
  attempted: number;
  successes: number;
  failures: number;
  permanentFailures: number;
  /** Items left on the cursor when the pass returned. */
  pending: number;
}

export interface PassRunOptions {
  signal?: AbortSignal | null;
  runState?: RunState | null;
}

/** A strategy sequences interval passes and reports one result per interval it touched. */
export type StrategyRunner = (ctx: SchedulerContext, options?: PassRunOptions) => Promise<IntervalPassResult[]>;

/**
 * One interval's pass: resumes the cursor on disk or scores and starts a new
 * one, runs batches against it, and archives it once pending is empty.
 */
export class IntervalPass {
  private cursor: ProgressCursor | null;
  private readonly tally: IntervalPassResult;

  private constructor(
    private readonly ctx: SchedulerContext,
    interval: string,
    cursor: ProgressCursor | null,
    resumed: boolean,
  ) {
    this.cursor = cursor;
    this.tally = {
      interval,
      passId: passIdForInterval(interval),
      status: cursor ? 'paused' : 'empty',
      resumed,
      batches: 0,
      attempted: 0,
      successes: 0,
      failures: 0,
      permanentFailures: 0,
      pending: cursor?.pending.length ?? 0,
    };
  }

  static async open(ctx: SchedulerContext, interval: string): Promise<IntervalPass> {
    const passId = passIdForInterval(interval);
    const existing = await ctx.progress.resumePass(passId);
    if (existing) {
      ctx.logger.info(
        { passId, interval, pending: existing.pending.length, attempted: existing.attempted.length },
        '[pass] resuming cursor from disk',
      );
      return new IntervalPass(ctx, interval, existing, true);
    }

    const now = ctx.clock();
    const entities = ctx.universe[interval] ?? [];
    const items = scoreWorkItems(entities, interval, ctx.metadata.snapshot(interval, now), now);
    if (items.length === 0) {
      ctx.logger.info({ passId, interval, universe: entities.length }, '[pass] nothing eligible');
      return new IntervalPass(ctx, interval, null, false);
    }
    const cursor = await ctx.progress.startPass(passId, interval, items);
    ctx.logger.info(
      { passId, interval, items: items.length, excluded: entities.length - items.length },
      '[pass] started',
    );
    return new IntervalPass(ctx, interval, cursor, false);
  }

  get interval(): string {
    return this.tally.interval;
  }

  /** True once the pass has nothing left to attempt in this run. */
  get done(): boolean {
    return this.tally.status === 'completed' || this.tally.status === 'empty';
  }

  get pendingCount(): number {
    return this.cursor?.pending.length ?? 0;
  }

  result(): IntervalPassResult {
    return { ...this.tally };
  }

  /** Run one batch; archives the cursor when it drains. Null when there was nothing to run. */
  async runBatch(executor: BatchExecutor, options: PassRunOptions = {}): Promise<BatchResult | null> {
    if (!this.cursor || this.done) return null;
    if (this.cursor.pending.length === 0) {
      await this.complete();
      return null;
    }

    options.runState?.setStatus({ currentInterval: this.tally.interval });
    const batch = await executor.runBatch(this.cursor, batchSizeFor(this.ctx.config, this.tally.interval), {
      signal: options.signal,
    });
    this.cursor = batch.cursor;
    this.tally.batches += 1;
    this.tally.attempted += batch.attempted;
    this.tally.successes += batch.successes;
    this.tally.failures += batch.failures;
    this.tally.permanentFailures += batch.permanentFailures;
    this.tally.pending = batch.cursor.pending.length;
    options.runState?.updateProgress({ processed: batch.attempted, errors: batch.failures });

    if (batch.stopped) {
      this.tally.status = 'stopped';
    } else if (batch.cursor.pending.length === 0) {
      await this.complete();
    }
    return batch;
  }

  /** Run batches until drained, stopped, or `maxBatches` batches ran in this call. */
  async drain(executor: BatchExecutor, options: PassRunOptions & { maxBatches?: number } = {}): Promise<IntervalPassResult> {
    const maxBatches = options.maxBatches ?? Number.POSITIVE_INFINITY;
    let ran = 0;
    while (!this.done) {
      if (options.signal?.aborted) {
        this.tally.status = 'stopped';
        break;
      }
      if (ran >= maxBatches) {
        this.tally.status = 'paused';
        break;
      }
      const batch = await this.runBatch(executor, options);
      if (!batch) continue;
      ran += 1;
      if (batch.stopped) break;
    }
    return this.result();
  }

  private async complete(): Promise<void> {
    if (!this.cursor) return;
    const archivedTo = await this.ctx.progress.completePass(this.cursor);
    this.tally.status = 'completed';
    this.tally.pending = 0;
    this.ctx.logger.info(
      {
        passId: this.tally.passId,
        interval: this.tally.interval,
        attempted: this.tally.attempted,
        successes: this.tally.successes,
        failures: this.tally.failures,
        archivedTo,
      },
      '[pass] completed',
    );
  }
}

/** Open (resume or start) the interval's pass and drain it under the given options. */
export async function runIntervalPass(
  ctx: SchedulerContext,
  interval: string,
  executor: BatchExecutor,
  options: PassRunOptions & { maxBatches?: number } = {},
): Promise<IntervalPassResult> {
  const pass = await IntervalPass.open(ctx, interval);
  options.runState?.updateProgress({ total: pass.pendingCount });
  return pass.drain(executor, options);
}
