/**
 * @stockpulse/jobs — Dead letter queue helpers
 *
 * Jobs that exhaust their retries are copied to `<queue>:dlq` with the
 * failure reason so they can be inspected by hand.
 */

import { Queue, type Job } from 'bullmq';
import { DEFAULT_REDIS_URL, parseRedisUrl, QUEUE_PREFIX } from './queue.js';
import type { DLQEntry, JobEnvelope } from './types.js';

export function createDLQ<T = unknown>(
  sourceQueueName: string,
  redisUrl: string = DEFAULT_REDIS_URL,
): Queue<DLQEntry<T>> {
  return new Queue<DLQEntry<T>>(`${sourceQueueName}:dlq`, {
    connection: parseRedisUrl(redisUrl),
    prefix: QUEUE_PREFIX,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export async function moveToDeadLetterQueue<T>(
  dlq: Queue<DLQEntry<T>>,
  job: Job<JobEnvelope<T>>,
  err: Error,
): Promise<void> {
  const entry: DLQEntry<T> = {
    job: job.data,
    error: err.message,
    stack: err.stack,
    failedAt: new Date().toISOString(),
    sourceQueue: job.queueName,
  };

  await dlq.add(`dlq:${job.data.type}`, entry, { jobId: `dlq:${job.data.id}` });
}
