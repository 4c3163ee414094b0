import { createLogger } from '@stockpulse/config';
import { errorMessage } from '../lib/errors.js';
import type { BatchStatisticsService } from './batch-statistics.service.js';
import type { CorrelationGraphService } from './correlation-graph.service.js';

const log = createLogger('analytics:sweep-scheduler');

export interface StatisticsSweepSchedulerOptions {
  enabled: boolean;
  intervalMinutes: number;
  batch: Pick<BatchStatisticsService, 'recalculateAllStatistics'>;
  graph: Pick<CorrelationGraphService, 'recalculateAllCorrelations'>;
}

export interface StatisticsSweepSchedulerHandle {
  runOnce: () => Promise<void>;
  stop: () => void;
}

/**
 * Periodically refreshes every item's statistics snapshot, then the
 * correlation graph. Overlapping runs are skipped.
 */
export function startStatisticsSweepScheduler(
  options: StatisticsSweepSchedulerOptions,
): StatisticsSweepSchedulerHandle {
  if (!options.enabled) {
    log.info('Statistics sweep scheduler disabled');
    return {
      runOnce: async () => undefined,
      stop: () => undefined,
    };
  }

  const intervalMs = Math.max(1, options.intervalMinutes) * 60 * 1000;
  let isRunning = false;

  const runOnce = async () => {
    if (isRunning) {
      log.warn('Skipping statistics sweep; previous run still in progress');
      return;
    }

    isRunning = true;
    try {
      const statistics = await options.batch.recalculateAllStatistics();
      log.info(
        { updated: statistics.updated, noData: statistics.noData, failed: statistics.failed },
        'Statistics sweep completed',
      );
    } catch (err) {
      log.error({ error: errorMessage(err) }, 'Statistics sweep failed');
    }

    try {
      const correlations = await options.graph.recalculateAllCorrelations();
      log.info(
        {
          pairsEvaluated: correlations.pairsEvaluated,
          significant: correlations.significantCorrelations,
          failed: correlations.failed,
        },
        'Correlation sweep completed',
      );
    } catch (err) {
      log.error({ error: errorMessage(err) }, 'Correlation sweep failed');
    } finally {
      isRunning = false;
    }
  };

  const timer = setInterval(() => {
    void runOnce();
  }, intervalMs);

  if (typeof timer.unref === 'function') {
    timer.unref();
  }

  log.info({ intervalMinutes: options.intervalMinutes }, 'Statistics sweep scheduler started');

  return {
    runOnce,
    stop: () => clearInterval(timer),
  };
}
