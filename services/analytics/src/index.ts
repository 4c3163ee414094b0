import { sql } from 'drizzle-orm';
import { config, createLogger } from '@stockpulse/config';
import { db, closeDb } from '@stockpulse/db';
import { ConsumptionAnalyticsEngine } from './engine.js';
import { engineOptionsFromConfig } from './lib/options.js';
import { DrizzleAnalyticsStore } from './store/drizzle-store.js';
import { startStatisticsSweepScheduler } from './services/statistics-sweep-scheduler.service.js';
import {
  createCorrelationRefreshPublisher,
  createCorrelationRefreshQueue,
  startAnalyticsWorkers,
  stopAnalyticsWorkers,
} from './workers/index.js';

const log = createLogger('analytics');

// ─── Startup Check ────────────────────────────────────────────────────
await db.execute(sql`SELECT 1`);

const correlationRefreshQueue = createCorrelationRefreshQueue(config.REDIS_URL);
const engine = new ConsumptionAnalyticsEngine(
  new DrizzleAnalyticsStore(db),
  engineOptionsFromConfig(config),
  createCorrelationRefreshPublisher(correlationRefreshQueue),
);

const workers = startAnalyticsWorkers(
  config.REDIS_URL,
  engine.correlations,
  config.ANALYTICS_CORRELATION_WORKER_CONCURRENCY,
  correlationRefreshQueue,
);

const sweepScheduler = startStatisticsSweepScheduler({
  enabled: config.ANALYTICS_STATISTICS_SWEEP_ENABLED,
  intervalMinutes: config.ANALYTICS_STATISTICS_SWEEP_INTERVAL_MINUTES,
  batch: engine.batch,
  graph: engine.correlations,
});
void sweepScheduler.runOnce();

log.info(
  {
    minDataPoints: engine.options.minDataPoints,
    significanceThreshold: engine.options.significanceThreshold,
    correlationWindowDays: engine.options.correlationWindowDays,
    statisticsWindowDays: engine.options.statisticsWindowDays,
  },
  'Analytics service started',
);

// ─── Graceful Shutdown ───────────────────────────────────────────────
async function shutdown(signal: string) {
  log.info({ signal }, 'Shutting down gracefully');
  sweepScheduler.stop();
  setTimeout(() => {
    log.fatal('Forced shutdown after timeout');
    process.exit(1);
  }, 10_000).unref();

  await stopAnalyticsWorkers(workers);
  await closeDb();
  log.info('Analytics service stopped');
  process.exit(0);
}

function onSignal(signal: string) {
  void shutdown(signal).catch((err) => {
    log.error({ err }, 'Shutdown failed');
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
