import type { StrategyName } from '../config.js';
import type { RateLimiterStateStore } from '../data/rateLimiterStateStore.js';
import { sleepWithAbort, type Sleep } from '../lib/abort.js';
import { errorMessage } from '../lib/errors.js';
import type { RunState } from '../lib/RunState.js';
import baseLogger, { type Logger } from '../logger.js';
import { writeMetricsTextfile } from '../metrics.js';
import { runStrategy, type RunSummary, type SchedulerContext } from '../orchestrators/index.js';

const RUN_MAX_ATTEMPTS = 3; // Initial attempt + 2 retries
const RUN_RETRY_DELAY_MS = 20_000;

export interface SchedulerRunOptions {
  strategy: StrategyName;
  runState: RunState;
  limiterStore?: RateLimiterStateStore | null;
  metricsTextfile?: string;
  signal?: AbortSignal | null;
}

/**
 * One strategy run plus its end-of-run bookkeeping: the learned limiter
 * spacing is saved and the metrics textfile rewritten whether or not the
 * run succeeded.
 */
export async function runSchedulerOnce(ctx: SchedulerContext, options: SchedulerRunOptions): Promise<RunSummary> {
  try {
    return await runStrategy(options.strategy, ctx, options.runState, { signal: options.signal });
  } finally {
    await persistRunArtifacts(ctx, options);
  }
}

async function persistRunArtifacts(ctx: SchedulerContext, options: SchedulerRunOptions): Promise<void> {
  if (options.limiterStore) {
    try {
      await options.limiterStore.save(ctx.executor.rateLimiter.exportState());
    } catch (err: unknown) {
      ctx.logger.error({ error: errorMessage(err) }, '[scheduler] failed to save rate limiter state');
    }
  }
  if (options.metricsTextfile) {
    try {
      await writeMetricsTextfile(options.metricsTextfile);
    } catch (err: unknown) {
      ctx.logger.error({ error: errorMessage(err), path: options.metricsTextfile }, '[scheduler] failed to write metrics');
    }
  }
}

export interface RetryOptions {
  maxAttempts?: number;
  retryDelayMs?: number;
  sleep?: Sleep;
  signal?: AbortSignal | null;
  logger?: Logger;
}

/**
 * Run `run` until it returns, retrying a thrown run after `retryDelayMs`.
 * Returns null when every attempt failed or the wait was aborted; a run that
 * returns (completed or stopped) is never retried.
 */
export async function runWithRetries(
  label: string,
  run: () => Promise<RunSummary>,
  options: RetryOptions = {},
): Promise<RunSummary | null> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts ?? RUN_MAX_ATTEMPTS));
  const retryDelayMs = Math.max(0, Number(options.retryDelayMs ?? RUN_RETRY_DELAY_MS));
  const sleep = options.sleep ?? sleepWithAbort;
  const log = options.logger ?? baseLogger;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const summary = await run();
      log.info({ status: summary.status, attempt, maxAttempts }, `[scheduler] ${label} finished`);
      return summary;
    } catch (err: unknown) {
      log.error({ error: errorMessage(err), attempt, maxAttempts }, `[scheduler] ${label} failed`);
    }

    if (attempt < maxAttempts) {
      if (options.signal?.aborted) return null;
      if (retryDelayMs > 0) {
        try {
          await sleep(retryDelayMs, options.signal);
        } catch (err: unknown) {
          log.info({ error: errorMessage(err) }, `[scheduler] ${label} retry wait interrupted`);
          return null;
        }
      }
    }
  }
  log.error({ maxAttempts }, `[scheduler] ${label} exhausted retries; waiting for next slot`);
  return null;
}

export interface RecurringRunOptions {
  everyMs: number;
  /** One scheduled slot; failures should already be handled by runWithRetries. */
  run: () => Promise<unknown>;
  clock?: () => number;
  logger?: Logger;
}

export interface RecurringRunHandle {
  /** Cancel the next slot. A slot already running finishes. */
  stop(): void;
  getState(): { running: boolean; stopped: boolean; nextRunUtc: string | null };
  /** Resolves after stop() once no slot is running. */
  readonly finished: Promise<void>;
}

/**
 * Run `run` immediately, then again `everyMs` after each slot finishes.
 * Slots never overlap.
 */
export function scheduleRecurringRuns(options: RecurringRunOptions): RecurringRunHandle {
  const everyMs = Math.max(1_000, options.everyMs);
  const clock = options.clock ?? Date.now;
  const log = options.logger ?? baseLogger;
  let timer: ReturnType<typeof setTimeout> | null = null;
  let nextRunMs: number | null = null;
  let running = false;
  let stopped = false;
  let resolveFinished: () => void = () => {};
  const finished = new Promise<void>((resolve) => {
    resolveFinished = resolve;
  });

  const scheduleNext = (delayMs: number): void => {
    if (stopped) return;
    nextRunMs = clock() + delayMs;
    timer = setTimeout(() => {
      timer = null;
      void runSlot();
    }, delayMs);
    log.info({ delayMs, nextRunUtc: new Date(nextRunMs).toISOString() }, '[scheduler] next run scheduled');
  };

  const runSlot = async (): Promise<void> => {
    running = true;
    nextRunMs = null;
    try {
      await options.run();
    } catch (err: unknown) {
      log.error({ error: errorMessage(err) }, '[scheduler] scheduled run crashed');
    } finally {
      running = false;
      if (stopped) {
        resolveFinished();
      } else {
        scheduleNext(everyMs);
      }
    }
  };

  void runSlot();

  return {
    stop(): void {
      if (stopped) return;
      stopped = true;
      if (timer) clearTimeout(timer);
      timer = null;
      nextRunMs = null;
      if (!running) resolveFinished();
    },
    getState() {
      return {
        running,
        stopped,
        nextRunUtc: nextRunMs === null ? null : new Date(nextRunMs).toISOString(),
      };
    },
    finished,
  };
}
