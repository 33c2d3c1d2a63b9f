import type { SchedulerConfig } from '../config.js';
import type { EntityMetadataStore } from '../data/entityMetadataStore.js';
import { ProgressStateStore } from '../data/progressStateStore.js';
import type { TickerUniverse } from '../data/universe.js';
import type { Sleep } from '../lib/abort.js';
import type { BarFetcher } from '../lib/barFetcher.js';
import { AdaptiveRateLimiter, type RateLimiterSnapshot } from '../lib/rateLimiter.js';
import baseLogger, { type Logger } from '../logger.js';
import { BatchExecutor, type SeriesSink } from '../services/batchExecutor.js';
import type { SchedulerContext } from './passRunner.js';

export interface SchedulerContextDeps {
  config: Pick<
    SchedulerConfig,
    | 'stateDir'
    | 'intervals'
    | 'batchSize'
    | 'batchSizes'
    | 'maxBatchesPerRun'
    | 'quotaTotalBatches'
    | 'rateLimit'
    | 'fetchTimeoutMs'
  >;
  universe: TickerUniverse;
  metadata: EntityMetadataStore;
  fetcher: BarFetcher;
  /** Limiter state restored from a previous run. */
  rateLimiterState?: RateLimiterSnapshot;
  onSeries?: SeriesSink;
  progress?: ProgressStateStore;
  clock?: () => number;
  sleep?: Sleep;
  logger?: Logger;
}

/** Wire stores, limiter and executors into the context every strategy runs against. */
export function createSchedulerContext(deps: SchedulerContextDeps): SchedulerContext {
  const clock = deps.clock ?? Date.now;
  const logger = deps.logger ?? baseLogger;
  const progress = deps.progress ?? new ProgressStateStore(deps.config.stateDir, { clock });

  const createExecutor = (rateLimiter: AdaptiveRateLimiter): BatchExecutor =>
    new BatchExecutor({
      fetcher: deps.fetcher,
      metadata: deps.metadata,
      progress,
      rateLimiter,
      fetchTimeoutMs: deps.config.fetchTimeoutMs,
      onSeries: deps.onSeries,
      clock,
      sleep: deps.sleep,
      logger,
    });

  return {
    config: deps.config,
    universe: deps.universe,
    metadata: deps.metadata,
    progress,
    executor: createExecutor(new AdaptiveRateLimiter(deps.config.rateLimit, deps.rateLimiterState ?? {})),
    createExecutor,
    clock,
    logger,
  };
}
