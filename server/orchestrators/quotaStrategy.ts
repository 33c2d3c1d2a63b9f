import { passIdForInterval } from '../data/progressStateStore.js';
import { universeEntityCounts } from '../data/universe.js';
import { runIntervalPass, type IntervalPassResult, type PassRunOptions, type SchedulerContext } from './passRunner.js';

/**
 * Split `totalBatches` across intervals in proportion to their entity counts.
 * Every non-empty interval gets at least one batch; empty intervals get none.
 */
export function computeIntervalQuotas(counts: Readonly<Record<string, number>>, totalBatches: number): Record<string, number> {
  const total = Object.values(counts).reduce((sum, count) => sum + Math.max(0, count), 0);
  const quotas: Record<string, number> = {};
  for (const [interval, count] of Object.entries(counts)) {
    quotas[interval] = count > 0 && total > 0 ? Math.max(1, Math.round((totalBatches * count) / total)) : 0;
  }
  return quotas;
}

/**
 * Resume-style sequencing, but each interval stops once its batch quota is
 * spent. An interval with a cursor on disk gets at least one batch so the
 * cursor drains even after its universe emptied.
 */
export async function runQuotaStrategy(
  ctx: SchedulerContext,
  options: PassRunOptions = {},
): Promise<IntervalPassResult[]> {
  const quotas = computeIntervalQuotas(
    universeEntityCounts(ctx.universe, ctx.config.intervals),
    ctx.config.quotaTotalBatches,
  );
  const activePasses = new Set(await ctx.progress.listActivePasses());
  for (const interval of ctx.config.intervals) {
    if ((quotas[interval] ?? 0) <= 0 && activePasses.has(passIdForInterval(interval))) {
      quotas[interval] = 1;
    }
  }
  ctx.logger.info({ quotas }, '[strategy:quota] batch quotas');

  const results: IntervalPassResult[] = [];
  for (const interval of ctx.config.intervals) {
    if (options.signal?.aborted) break;
    const quota = quotas[interval] ?? 0;
    if (quota <= 0) continue;
    const result = await runIntervalPass(ctx, interval, ctx.executor, { ...options, maxBatches: quota });
    results.push(result);
    if (result.status === 'stopped') break;
    if (result.status === 'paused') {
      ctx.logger.info({ interval, quota, pending: result.pending }, '[strategy:quota] quota spent');
    }
  }
  return results;
}
