/**
 * @stockpulse/jobs — Shared job types
 */

/**
 * Envelope wrapped around every job payload so workers can log and
 * dead-letter jobs without knowing the payload shape.
 */
export interface JobEnvelope<T = unknown> {
  id: string;
  type: string;
  payload: T;
  attempts: number;
  maxRetries: number;
  createdAt: string;
}

export interface CreateQueueOptions {
  redisUrl?: string;
  defaultJobOptions?: {
    attempts?: number;
    backoff?: { type: 'exponential' | 'fixed'; delay: number };
    removeOnComplete?: number | boolean;
    removeOnFail?: number | boolean;
  };
}

export interface CreateWorkerOptions {
  redisUrl?: string;
  concurrency?: number;
  lockDuration?: number;
  stalledInterval?: number;
}

/** A job that exhausted its retries, as stored on the dead letter queue. */
export interface DLQEntry<T = unknown> {
  job: JobEnvelope<T>;
  error: string;
  stack: string | undefined;
  failedAt: string;
  sourceQueue: string;
}
