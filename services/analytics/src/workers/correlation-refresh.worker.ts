/**
 * Correlation Refresh Worker
 *
 * Recomputes the correlation edges of a single item after its statistics
 * snapshot changed. Producers publish through `enqueueCorrelationRefresh`
 * (or the publisher adapter handed to the statistics service), so the
 * per-item update path never waits on the pair sweep.
 *
 * Items deleted between publish and processing are skipped, not retried.
 */

import type { Job, Queue, Worker } from 'bullmq';
import {
  attemptsExhausted,
  buildJobEnvelope,
  createDLQ,
  createQueue,
  createWorker,
  moveToDeadLetterQueue,
} from '@stockpulse/jobs';
import type { JobEnvelope } from '@stockpulse/jobs';
import { createLogger } from '@stockpulse/config';
import { NotFoundError, errorMessage } from '../lib/errors.js';
import type { CorrelationGraphService } from '../services/correlation-graph.service.js';
import type { CorrelationRefreshPublisher } from '../services/statistics.service.js';

const log = createLogger('analytics:correlation-refresh');

// ─── Payload Types ──────────────────────────────────────────────────

export interface CorrelationRefreshPayload {
  itemId: string;
  /** Why the refresh was requested, e.g. `statistics_updated`. */
  reason: string;
}

export type CorrelationRefresher = Pick<CorrelationGraphService, 'recalculateCorrelationsForItem'>;

// ─── Constants ──────────────────────────────────────────────────────

export const QUEUE_NAME = 'analytics:correlation-refresh';
export const JOB_TYPE = 'analytics.correlation_refresh';

// ─── Queue Factory ──────────────────────────────────────────────────

export function createCorrelationRefreshQueue(
  redisUrl: string,
): Queue<JobEnvelope<CorrelationRefreshPayload>> {
  return createQueue<CorrelationRefreshPayload>(QUEUE_NAME, {
    redisUrl,
    defaultJobOptions: {
      attempts: 3,
      backoff: { type: 'exponential', delay: 5000 },
      removeOnComplete: 100,
      removeOnFail: 500,
    },
  });
}

// ─── Processor ──────────────────────────────────────────────────────

export function createCorrelationRefreshProcessor(graph: CorrelationRefresher) {
  return async (job: Job<JobEnvelope<CorrelationRefreshPayload>>): Promise<void> => {
    const { itemId, reason } = job.data.payload;
    log.debug({ jobId: job.data.id, itemId, reason }, 'Refreshing item correlations');

    try {
      const result = await graph.recalculateCorrelationsForItem(itemId);
      log.info(
        { jobId: job.data.id, itemId, totalCorrelations: result.totalCorrelations },
        'Item correlations refreshed',
      );
    } catch (err) {
      if (err instanceof NotFoundError) {
        log.warn({ jobId: job.data.id, itemId }, 'Item no longer exists; skipping refresh');
        return;
      }
      log.error(
        { jobId: job.data.id, itemId, attempt: job.attemptsMade, error: errorMessage(err) },
        'Correlation refresh failed',
      );
      throw err;
    }
  };
}

// ─── Worker Startup ─────────────────────────────────────────────────

export function startCorrelationRefreshWorker(
  redisUrl: string,
  graph: CorrelationRefresher,
  concurrency = 1,
  queue: Queue<JobEnvelope<CorrelationRefreshPayload>> = createCorrelationRefreshQueue(redisUrl),
): {
  worker: Worker<JobEnvelope<CorrelationRefreshPayload>>;
  queue: Queue<JobEnvelope<CorrelationRefreshPayload>>;
} {
  const dlq = createDLQ<CorrelationRefreshPayload>(QUEUE_NAME, redisUrl);

  const worker = createWorker<CorrelationRefreshPayload>(
    QUEUE_NAME,
    createCorrelationRefreshProcessor(graph),
    { redisUrl, concurrency },
  );

  worker.on('completed', (job) => {
    log.debug({ jobId: job.data.id, itemId: job.data.payload.itemId }, 'Job completed');
  });

  worker.on('failed', async (job, err) => {
    if (!job) return;
    log.error(
      {
        jobId: job.data.id,
        itemId: job.data.payload.itemId,
        attempt: job.attemptsMade,
        maxAttempts: job.opts.attempts,
        error: err.message,
      },
      'Job failed',
    );

    if (attemptsExhausted(job)) {
      await moveToDeadLetterQueue(dlq, job, err);
      log.warn({ jobId: job.data.id }, 'Job moved to dead letter queue');
    }
  });

  log.info({ concurrency }, 'Correlation refresh worker started');

  return { worker, queue };
}

// ─── Producers ──────────────────────────────────────────────────────

export function enqueueCorrelationRefresh(
  queue: Queue<JobEnvelope<CorrelationRefreshPayload>>,
  itemId: string,
  reason = 'manual',
) {
  const envelope = buildJobEnvelope<CorrelationRefreshPayload>(JOB_TYPE, { itemId, reason });

  return queue.add(JOB_TYPE, envelope, {
    jobId: `correlation-refresh:${itemId}:${Date.now()}`,
  });
}

/** Adapts the queue to the statistics service's publisher seam. */
export function createCorrelationRefreshPublisher(
  queue: Queue<JobEnvelope<CorrelationRefreshPayload>>,
): CorrelationRefreshPublisher {
  return {
    publish: async (itemId, reason) => {
      await enqueueCorrelationRefresh(queue, itemId, reason);
    },
  };
}
