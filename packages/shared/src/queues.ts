/**
 * BullMQ Queue Definitions
 *
 * Queue names, job payloads, and queue/worker factories.
 */

import { Queue, Worker, Job, ConnectionOptions } from 'bullmq';
import { config } from './config';
import { logger } from './logger';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  DOCUMENT_RECEIVED: 'document_received',
  DOCUMENT_CANCEL: 'document_cancel',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * document_received - one document to run through the pipeline.
 * Raw bytes live in the object store under `raw_uri`.
 */
export interface DocumentReceivedJob {
  correlation_id: string;
  document_id: string;
  raw_uri: string;
  mime_type: string;
  caller_id: string;
  source_filename?: string;
  received_at: string;
}

/**
 * document_cancel - stop a job at its next stage boundary.
 */
export interface DocumentCancelJob {
  document_id: string;
}

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl.startsWith('redis://')) {
    try {
      const url = new URL(redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (err) {
      logger.warn('Invalid REDIS_URL, falling back to host/port', {
        error: err instanceof Error ? err.message : String(err),
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

// Pipeline failures end in a terminal job state, so BullMQ retries only
// cover crashes of the worker process itself.
const defaultJobOptions = {
  attempts: config.maxJobAttempts,
  backoff: {
    type: 'exponential' as const,
    delay: config.backoffBaseMs,
  },
  removeOnComplete: 100,
  removeOnFail: 1000,
};

export function createQueue<TData, TResult = void>(queueName: QueueName): Queue<TData, TResult> {
  return new Queue<TData, TResult>(queueName, {
    connection: getRedisConnection(),
    defaultJobOptions,
  });
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const concurrency = options.concurrency || config.workerConcurrency;
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', { queue: queueName, bullJobId: job.id });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      bullJobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', { queue: queueName, concurrency });

  return worker;
}
