import { linkAbortSignalToController } from '../lib/abort.js';
import { errorMessage } from '../lib/errors.js';
import { mapWithConcurrency } from '../lib/mapWithConcurrency.js';
import { AdaptiveRateLimiter, type RateLimiterSnapshot } from '../lib/rateLimiter.js';
import { runIntervalPass, type IntervalPassResult, type PassRunOptions, type SchedulerContext } from './passRunner.js';

/**
 * One worker per interval, all running at once. Each worker gets a private
 * limiter seeded from the shared one, so intervals never spend each other's
 * delay budget; entity metadata and progress stores are shared and serialize
 * their own writes.
 *
 * A worker that throws (a store failure) aborts the others at their next item
 * boundary, and the first error is rethrown once every worker has settled.
 */
export async function runParallelStrategy(
  ctx: SchedulerContext,
  options: PassRunOptions = {},
): Promise<IntervalPassResult[]> {
  const intervals = [...ctx.config.intervals];
  const sharedLimiter = ctx.executor.rateLimiter;
  const seed = sharedLimiter.exportState();
  const workerLimiters = new Map<string, AdaptiveRateLimiter>();
  const controller = new AbortController();
  const unlinkAbort = linkAbortSignalToController(options.signal ?? null, controller);
  let firstError: unknown = null;

  try {
    const settled = await mapWithConcurrency(
      intervals,
      intervals.length,
      async (interval) => {
        const initial: RateLimiterSnapshot = seed[interval] ? { [interval]: seed[interval] } : {};
        const limiter = new AdaptiveRateLimiter(ctx.config.rateLimit, initial);
        workerLimiters.set(interval, limiter);
        return runIntervalPass(ctx, interval, ctx.createExecutor(limiter), {
          signal: controller.signal,
          runState: options.runState,
        });
      },
      (result, _index, interval) => {
        if (!('error' in result) || firstError !== null) return;
        firstError = result.error;
        ctx.logger.error({ interval, error: errorMessage(result.error) }, '[strategy:parallel] worker failed; stopping others');
        if (!controller.signal.aborted) controller.abort();
      },
    );

    if (firstError !== null) throw firstError;
    const results: IntervalPassResult[] = [];
    for (const result of settled) {
      if (!('error' in result)) results.push(result);
    }
    return results;
  } finally {
    unlinkAbort();
    for (const limiter of workerLimiters.values()) {
      for (const [intervalClass, state] of Object.entries(limiter.exportState())) {
        sharedLimiter.setState(intervalClass, state);
      }
    }
  }
}
