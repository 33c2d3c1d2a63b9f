import logger from './server/logger.js';
import { buildSchedulerConfig, validateStartupEnvironment, type SchedulerConfig } from './server/config.js';
import { createMetadataDatabase } from './server/db.js';
import { runMigrations } from './server/db/migrate.js';
import { FileEntityMetadataStore, type EntityMetadataStore } from './server/data/entityMetadataStore.js';
import { PostgresEntityMetadataStore } from './server/data/postgresEntityMetadataStore.js';
import { RateLimiterStateStore } from './server/data/rateLimiterStateStore.js';
import { loadTickerUniverse, universeEntityCounts } from './server/data/universe.js';
import { errorMessage } from './server/lib/errors.js';
import { RunState } from './server/lib/RunState.js';
import { createSchedulerContext } from './server/orchestrators/index.js';
import { DataApiBarFetcher } from './server/services/dataApi.js';
import {
  runSchedulerOnce,
  runWithRetries,
  scheduleRecurringRuns,
  type RecurringRunHandle,
} from './server/services/schedulerService.js';

const runState = new RunState('scheduler');
const shutdownController = new AbortController();
let recurringRuns: RecurringRunHandle | null = null;
let isShuttingDown = false;
let forceExitAfterMs = 60_000;

interface OpenedMetadataStore {
  store: EntityMetadataStore;
  close: () => Promise<void>;
}

async function openMetadataStore(config: SchedulerConfig): Promise<OpenedMetadataStore> {
  const policy = { maxConsecutiveErrors: config.maxConsecutiveErrors, errorCooldownMs: config.errorCooldownMs };
  if (config.metadataBackend === 'postgres') {
    const database = createMetadataDatabase({ databaseUrl: config.databaseUrl });
    try {
      await runMigrations(database.db);
    } catch (err: unknown) {
      await database.close();
      throw err;
    }
    return { store: new PostgresEntityMetadataStore(database.db, policy), close: database.close };
  }
  return { store: new FileEntityMetadataStore(config.stateDir, policy), close: async () => {} };
}

async function runScheduler(): Promise<number> {
  validateStartupEnvironment();
  const config = buildSchedulerConfig();
  forceExitAfterMs = config.fetchTimeoutMs + 15_000;

  const universe = await loadTickerUniverse(config.universeFile, config.intervals);
  logger.info(
    {
      strategy: config.strategy,
      backend: config.metadataBackend,
      stateDir: config.stateDir,
      entities: universeEntityCounts(universe, config.intervals),
    },
    'Scheduler starting',
  );

  const metadata = await openMetadataStore(config);
  try {
    await metadata.store.load();
    const limiterStore = new RateLimiterStateStore(config.stateDir);
    const ctx = createSchedulerContext({
      config,
      universe,
      metadata: metadata.store,
      fetcher: new DataApiBarFetcher({ baseUrl: config.dataApiBaseUrl, apiKey: config.dataApiKey }),
      rateLimiterState: await limiterStore.load(),
    });
    if (isShuttingDown) {
      logger.info('Shutdown requested during startup; no run started');
      return 0;
    }
    const runOnce = () =>
      runSchedulerOnce(ctx, {
        strategy: config.strategy,
        runState,
        limiterStore,
        metricsTextfile: config.metricsTextfile,
        signal: shutdownController.signal,
      });

    if (config.runEveryMs > 0) {
      recurringRuns = scheduleRecurringRuns({
        everyMs: config.runEveryMs,
        run: () => runWithRetries(`${config.strategy} run`, runOnce, { signal: shutdownController.signal }),
      });
      if (isShuttingDown) recurringRuns.stop();
      await recurringRuns.finished;
      return 0;
    }

    const summary = await runOnce();
    logger.info(
      {
        status: summary.status,
        attempted: summary.attempted,
        successes: summary.successes,
        failures: summary.failures,
        permanentFailures: summary.permanentFailures,
      },
      'Scheduler run finished',
    );
    return 0;
  } finally {
    await metadata.close();
  }
}

function shutdownScheduler(signal: string): void {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info({ signal }, 'Received signal; stopping at the next item boundary');
  shutdownController.abort();
  recurringRuns?.stop();
  runState.requestStop();

  const forceExitTimer = setTimeout(() => {
    logger.error('Graceful shutdown timed out; forcing exit');
    process.exit(1);
  }, forceExitAfterMs);
  if (typeof forceExitTimer.unref === 'function') {
    forceExitTimer.unref();
  }
}

process.on('SIGINT', () => {
  shutdownScheduler('SIGINT');
});
process.on('SIGTERM', () => {
  shutdownScheduler('SIGTERM');
});
process.on('unhandledRejection', (reason) => {
  logger.error({ error: errorMessage(reason) }, 'Unhandled promise rejection');
});

void (async function startScheduler() {
  try {
    process.exitCode = await runScheduler();
  } catch (err: unknown) {
    logger.error({ error: errorMessage(err) }, 'Fatal: scheduler run failed');
    process.exitCode = 1;
  }
})();
