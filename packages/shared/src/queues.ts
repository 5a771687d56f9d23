/**
 * BullMQ Queue Definitions
 *
 * Queue names, job interfaces, and queue factory functions.
 */

import { Queue, Worker, Job, UnrecoverableError, type ConnectionOptions, type JobsOptions } from 'bullmq';
import { config } from './config';
import { logger } from './logger';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  EXTRACT_SOF: 'extract_sof',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * extract_sof - Enqueued once the text of a Statement of Facts is available
 */
export interface ExtractSofJob {
  event_type: 'document.text_available';
  correlation_id: string;
  document_id: string;
  file_name: string;
  document_text: string;
}

// ============================================================================
// Redis Connection
// ============================================================================

/**
 * BullMQ connection from REDIS_URL (redis:// or rediss://, credentials
 * included), falling back to REDIS_HOST/REDIS_PORT.
 */
export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl && /^rediss?:\/\//.test(redisUrl)) {
    try {
      const url = new URL(redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        username: url.username ? decodeURIComponent(url.username) : undefined,
        password: url.password ? decodeURIComponent(url.password) : undefined,
        ...(url.protocol === 'rediss:' ? { tls: {} } : {}),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (error) {
      logger.warn('Invalid REDIS_URL, using REDIS_HOST/REDIS_PORT', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Queue Factory
// ============================================================================

const defaultJobOptions: JobsOptions = {
  attempts: config.maxJobAttempts,
  backoff: {
    type: 'exponential',
    delay: config.backoffBaseMs,
  },
  removeOnComplete: 100, // Keep last 100 completed jobs
  removeOnFail: 1000, // Keep last 1000 failed jobs
};

export function createQueue<TData, TResult>(
  queueName: QueueName,
  jobOptions: JobsOptions = {}
): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions: { ...defaultJobOptions, ...jobOptions },
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
  /** How long a job may run before its lock lapses (ms) */
  lockDurationMs?: number;
}

// One job makes three LLM calls, two of them possibly in sequence before adjudication
const LLM_CALLS_PER_JOB = 3;

function hasAttemptsLeft(job: Job, error: Error): boolean {
  if (error instanceof UnrecoverableError) return false;
  return job.attemptsMade < (job.opts.attempts ?? 1);
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const concurrency = options.concurrency || config.workerConcurrency;
  const lockDuration = options.lockDurationMs ?? config.llmRequestTimeoutMs * LLM_CALLS_PER_JOB;

  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency,
    lockDuration,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', {
      queue: queueName,
      jobId: job.id,
      attempts: job.attemptsMade,
    });
  });

  worker.on('failed', (job, err) => {
    const willRetry = job ? hasAttemptsLeft(job, err) : false;
    const context = {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
      will_retry: willRetry,
    };

    if (willRetry) {
      logger.warn('Job attempt failed, retrying', { ...context, error: err.message });
    } else {
      logger.error('Job failed', err, context);
    }
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', {
    queue: queueName,
    concurrency,
    lock_duration_ms: lockDuration,
  });

  return worker;
}
