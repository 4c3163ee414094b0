/**
 * @stockpulse/jobs — BullMQ queue framework
 *
 * Provides queue creation, worker management and dead letter queues
 * for background job processing.
 */

// Queue and worker factories
export {
  createQueue,
  createWorker,
  buildJobEnvelope,
  attemptsExhausted,
  parseRedisUrl,
  QUEUE_PREFIX,
  DEFAULT_JOB_OPTIONS,
} from './queue.js';
export type { RedisConnectionOptions } from './queue.js';

// Dead letter queue
export { createDLQ, moveToDeadLetterQueue } from './dlq.js';

// Types
export type {
  JobEnvelope,
  CreateQueueOptions,
  CreateWorkerOptions,
  DLQEntry,
} from './types.js';
