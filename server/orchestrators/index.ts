import type { StrategyName } from '../config.js';
import { linkAbortSignalToController } from '../lib/abort.js';
import { errorMessage } from '../lib/errors.js';
import { RunState } from '../lib/RunState.js';
import { runCrossIntervalStrategy } from './crossIntervalStrategy.js';
import { runParallelStrategy } from './parallelStrategy.js';
import type { IntervalPassResult, SchedulerContext, StrategyRunner } from './passRunner.js';
import { runQuotaStrategy } from './quotaStrategy.js';
import { runResumeStrategy } from './resumeStrategy.js';

export { createSchedulerContext } from './context.js';
export type { SchedulerContextDeps } from './context.js';
export { IntervalPass, runIntervalPass } from './passRunner.js';
export type { IntervalPassResult, IntervalPassStatus, SchedulerContext } from './passRunner.js';
export { computeIntervalQuotas } from './quotaStrategy.js';

export const STRATEGIES: Readonly<Record<StrategyName, StrategyRunner>> = {
  resume: runResumeStrategy,
  'cross-interval': runCrossIntervalStrategy,
  quota: runQuotaStrategy,
  parallel: runParallelStrategy,
};

export interface RunSummary {
  strategy: StrategyName;
  status: 'completed' | 'stopped';
  intervals: IntervalPassResult[];
  attempted: number;
  successes: number;
  failures: number;
  permanentFailures: number;
}

export function summarizeRun(strategy: StrategyName, stopped: boolean, intervals: IntervalPassResult[]): RunSummary {
  const summary: RunSummary = {
    strategy,
    status: stopped ? 'stopped' : 'completed',
    intervals,
    attempted: 0,
    successes: 0,
    failures: 0,
    permanentFailures: 0,
  };
  for (const result of intervals) {
    summary.attempted += result.attempted;
    summary.successes += result.successes;
    summary.failures += result.failures;
    summary.permanentFailures += result.permanentFailures;
  }
  return summary;
}

export interface RunStrategyOptions {
  /** Outer stop signal (process shutdown); already aborted means nothing is fetched. */
  signal?: AbortSignal | null;
}

/**
 * Run one strategy to the end under `runState`. A stop request, or an abort of
 * `options.signal`, ends the run at the next item boundary with status 'stopped'. A thrown error (a store
 * failure) marks the run 'failed' and is rethrown; the cursor on disk is the
 * last one committed.
 */
export async function runStrategy(
  name: StrategyName,
  ctx: SchedulerContext,
  runState: RunState = new RunState('scheduler'),
  options: RunStrategyOptions = {},
): Promise<RunSummary> {
  const abortController = runState.beginRun(name, new Date(ctx.clock()));
  const unlinkSignal = linkAbortSignalToController(options.signal ?? null, abortController);
  const log = ctx.logger.child({ strategy: name });
  log.info({ intervals: ctx.config.intervals }, `[strategy:${name}] run started`);
  try {
    const results = await STRATEGIES[name](ctx, { signal: abortController.signal, runState });
    const stopped = runState.shouldStop || results.some((result) => result.status === 'stopped');
    const summary = summarizeRun(name, stopped, results);
    if (stopped) {
      runState.markStopped(new Date(ctx.clock()));
    } else {
      runState.markCompleted(new Date(ctx.clock()));
    }
    log.info(
      {
        status: summary.status,
        attempted: summary.attempted,
        successes: summary.successes,
        failures: summary.failures,
        permanentFailures: summary.permanentFailures,
      },
      `[strategy:${name}] run finished`,
    );
    return summary;
  } catch (err: unknown) {
    runState.markFailed(new Date(ctx.clock()));
    log.error({ error: errorMessage(err) }, `[strategy:${name}] run failed`);
    throw err;
  } finally {
    unlinkSignal();
    runState.cleanup(abortController);
  }
}
