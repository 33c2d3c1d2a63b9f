import { runIntervalPass, type IntervalPassResult, type PassRunOptions, type SchedulerContext } from './passRunner.js';

/**
 * Visit intervals in configured order and drain each one before moving on.
 * An interrupted run leaves its cursor on disk; the next run picks it up
 * before any fresh scoring happens for that interval.
 */
export async function runResumeStrategy(
  ctx: SchedulerContext,
  options: PassRunOptions = {},
): Promise<IntervalPassResult[]> {
  const results: IntervalPassResult[] = [];
  for (const interval of ctx.config.intervals) {
    if (options.signal?.aborted) break;
    const result = await runIntervalPass(ctx, interval, ctx.executor, options);
    results.push(result);
    if (result.status === 'stopped') {
      ctx.logger.info({ interval, pending: result.pending }, '[strategy:resume] stop requested');
      break;
    }
  }
  return results;
}
