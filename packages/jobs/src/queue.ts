/**
 * @stockpulse/jobs — Queue and Worker factories
 *
 * Every queue and worker shares one key prefix, one Redis URL format and
 * one set of retry defaults; callers override per queue where needed.
 */

import { randomUUID } from 'node:crypto';
import { Queue, Worker, type Job, type Processor } from 'bullmq';
import type { CreateQueueOptions, CreateWorkerOptions, JobEnvelope } from './types.js';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379';

/** Key prefix for all project queues. */
export const QUEUE_PREFIX = 'stockpulse';

type JobDefaults = Required<NonNullable<CreateQueueOptions['defaultJobOptions']>>;
type WorkerDefaults = Required<Omit<CreateWorkerOptions, 'redisUrl'>>;

export const DEFAULT_JOB_OPTIONS: JobDefaults = {
  attempts: 3,
  backoff: { type: 'exponential', delay: 1000 },
  removeOnComplete: 1000,
  removeOnFail: 5000,
};

const DEFAULT_WORKER_OPTIONS: WorkerDefaults = {
  concurrency: 5,
  lockDuration: 30_000,
  stalledInterval: 30_000,
};

// ─── Connection ─────────────────────────────────────────────────────

/** Single-node Redis connection options returned by parseRedisUrl. */
export interface RedisConnectionOptions {
  host: string;
  port: number;
  password: string | undefined;
  username: string | undefined;
  db: number;
  /** BullMQ workers block on Redis; retries must be left to BullMQ. */
  maxRetriesPerRequest: null;
}

export function parseRedisUrl(url: string): RedisConnectionOptions {
  const parsed = new URL(url);
  const db = Number.parseInt(parsed.pathname.slice(1), 10);
  return {
    host: parsed.hostname,
    port: Number.parseInt(parsed.port || '6379', 10),
    password: parsed.password || undefined,
    username: parsed.username || undefined,
    db: Number.isNaN(db) ? 0 : db,
    maxRetriesPerRequest: null,
  };
}

// ─── Factories ──────────────────────────────────────────────────────

/**
 * @example
 * ```ts
 * const queue = createQueue<CorrelationRefreshPayload>('analytics:correlation-refresh');
 * await queue.add('analytics.correlation_refresh', envelope);
 * ```
 */
export function createQueue<T = unknown>(
  name: string,
  opts: CreateQueueOptions = {},
): Queue<JobEnvelope<T>> {
  return new Queue<JobEnvelope<T>>(name, {
    connection: parseRedisUrl(opts.redisUrl ?? DEFAULT_REDIS_URL),
    prefix: QUEUE_PREFIX,
    defaultJobOptions: { ...DEFAULT_JOB_OPTIONS, ...opts.defaultJobOptions },
  });
}

/** The queue name must match one created with createQueue. */
export function createWorker<T = unknown>(
  name: string,
  processor: Processor<JobEnvelope<T>>,
  opts: CreateWorkerOptions = {},
): Worker<JobEnvelope<T>> {
  const { redisUrl = DEFAULT_REDIS_URL, ...overrides } = opts;
  return new Worker<JobEnvelope<T>>(name, processor, {
    connection: parseRedisUrl(redisUrl),
    prefix: QUEUE_PREFIX,
    ...DEFAULT_WORKER_OPTIONS,
    ...overrides,
  });
}

// ─── Envelopes ──────────────────────────────────────────────────────

export function buildJobEnvelope<T>(type: string, payload: T, maxRetries = 3): JobEnvelope<T> {
  return {
    id: randomUUID(),
    type,
    payload,
    attempts: 1,
    maxRetries,
    createdAt: new Date().toISOString(),
  };
}

/** True once BullMQ will not retry the job again. */
export function attemptsExhausted(job: Pick<Job, 'attemptsMade' | 'opts'>): boolean {
  return job.attemptsMade >= (job.opts.attempts ?? DEFAULT_JOB_OPTIONS.attempts);
}
