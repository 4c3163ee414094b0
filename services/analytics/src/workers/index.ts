/**
 * Analytics Workers — Barrel Export
 */

import type { Queue, Worker } from 'bullmq';
import type { JobEnvelope } from '@stockpulse/jobs';
import { createLogger } from '@stockpulse/config';

import {
  startCorrelationRefreshWorker,
  createCorrelationRefreshQueue,
  createCorrelationRefreshPublisher,
  enqueueCorrelationRefresh,
} from './correlation-refresh.worker.js';
import type { CorrelationRefresher, CorrelationRefreshPayload } from './correlation-refresh.worker.js';

const log = createLogger('analytics:workers');

// ─── Re-exports ─────────────────────────────────────────────────────

export {
  startCorrelationRefreshWorker,
  createCorrelationRefreshQueue,
  createCorrelationRefreshPublisher,
  enqueueCorrelationRefresh,
};

export type { CorrelationRefresher, CorrelationRefreshPayload };

// ─── Combined Startup ───────────────────────────────────────────────

export interface AnalyticsWorkerInstances {
  correlationRefresh: {
    worker: Worker<JobEnvelope<CorrelationRefreshPayload>>;
    queue: Queue<JobEnvelope<CorrelationRefreshPayload>>;
  };
}

export function startAnalyticsWorkers(
  redisUrl: string,
  graph: CorrelationRefresher,
  concurrency: number,
  correlationRefreshQueue?: Queue<JobEnvelope<CorrelationRefreshPayload>>,
): AnalyticsWorkerInstances {
  const correlationRefresh = startCorrelationRefreshWorker(
    redisUrl,
    graph,
    concurrency,
    correlationRefreshQueue,
  );
  log.info({ workers: ['correlation-refresh'] }, 'All analytics workers started');
  return { correlationRefresh };
}

/**
 * Closes workers first (stops processing), then their queues.
 */
export async function stopAnalyticsWorkers(instances: AnalyticsWorkerInstances): Promise<void> {
  await Promise.allSettled([instances.correlationRefresh.worker.close()]);
  await Promise.allSettled([instances.correlationRefresh.queue.close()]);
  log.info('All analytics workers stopped');
}
