import { IntervalPass, type IntervalPassResult, type PassRunOptions, type SchedulerContext } from './passRunner.js';

/**
 * Round-robin: each round runs one batch for every interval that still has
 * pending work, for at most `maxBatchesPerRun` rounds. An interval that
 * drains is archived and sits out the remaining rounds.
 */
export async function runCrossIntervalStrategy(
  ctx: SchedulerContext,
  options: PassRunOptions = {},
): Promise<IntervalPassResult[]> {
  const passes: IntervalPass[] = [];
  for (const interval of ctx.config.intervals) {
    const pass = await IntervalPass.open(ctx, interval);
    options.runState?.updateProgress({ total: pass.pendingCount });
    passes.push(pass);
  }

  let stopped = false;
  for (let round = 0; round < ctx.config.maxBatchesPerRun && !stopped; round++) {
    const active = passes.filter((pass) => !pass.done);
    if (active.length === 0) break;
    for (const pass of active) {
      if (options.signal?.aborted) {
        stopped = true;
        break;
      }
      const batch = await pass.runBatch(ctx.executor, options);
      if (batch?.stopped) {
        stopped = true;
        break;
      }
    }
    ctx.logger.debug({ round: round + 1, active: active.length }, '[strategy:cross-interval] round finished');
  }

  return passes.map((pass) => pass.result());
}
