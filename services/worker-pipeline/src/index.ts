/**
 * Pipeline Worker
 *
 * Consumes document_received, runs each document through the orchestrator
 * and records the outcome. document_cancel stores a cancellation request
 * that stops the job at its next stage boundary, on whichever replica runs it.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  createQueue,
  createWorker,
  reportQueueMetrics,
  serveMetrics,
  QUEUE_NAMES,
  type DocumentCancelJob,
  type DocumentReceivedJob,
  type JobOutcome,
} from '@docintake/shared';
import { buildPipeline } from './lib/bootstrap';
import { CancellationRegistry } from './lib/cancellation';
import { createPool, PgCancellationStore, purgeExpiredJobs } from './lib/db';
import { readRawDocument } from './lib/object-store';
import { processDocument } from './lib/process-document';

const PURGE_INTERVAL_MS = 60 * 60 * 1000;

const pool = createPool(config.databaseUrl);
const cancellations = new CancellationRegistry(new PgCancellationStore(pool), { ttlMs: config.cancellationTtlMs });
const orchestrator = buildPipeline(config, { pool, cancellations });

const receivedQueue = createQueue<DocumentReceivedJob, JobOutcome>(QUEUE_NAMES.DOCUMENT_RECEIVED);

/**
 * Process document_received job
 */
function processDocumentReceived(job: Job<DocumentReceivedJob, JobOutcome>): Promise<JobOutcome> {
  logger.debug('Picked up document_received', { bullJobId: job.id, document_id: job.data.document_id });

  return processDocument(
    job.data,
    { number: job.attemptsMade + 1, maxAttempts: job.opts.attempts ?? 1 },
    {
      orchestrator,
      readRaw: (rawUri) => readRawDocument(rawUri, config.objectStorePath),
      onSettled: (documentId) => cancellations.clear(documentId),
    }
  );
}

/**
 * Process document_cancel job
 */
async function processDocumentCancel(job: Job<DocumentCancelJob, void>): Promise<void> {
  const accepted = await cancellations.cancel(job.data.document_id);
  if (accepted) {
    logger.info('Cancellation requested', { document_id: job.data.document_id });
  }
}

async function purge(): Promise<void> {
  try {
    await purgeExpiredJobs(pool, config.jobRetentionDays);
  } catch (error) {
    logger.error('Retention purge failed', error);
  }
}

// Expose /metrics for Prometheus
const metricsServer =
  config.metricsPort > 0
    ? serveMetrics(config.metricsPort, () =>
        reportQueueMetrics([{ name: QUEUE_NAMES.DOCUMENT_RECEIVED, queue: receivedQueue }])
      )
    : undefined;

// Create and start the workers
const worker = createWorker<DocumentReceivedJob, JobOutcome>(QUEUE_NAMES.DOCUMENT_RECEIVED, processDocumentReceived, {
  concurrency: config.workerConcurrency,
});
const cancelWorker = createWorker<DocumentCancelJob, void>(QUEUE_NAMES.DOCUMENT_CANCEL, processDocumentCancel, {
  concurrency: 1,
});

const purgeTimer = setInterval(() => void purge(), PURGE_INTERVAL_MS);
purgeTimer.unref();

logger.info('Pipeline worker started', { concurrency: config.workerConcurrency });

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  clearInterval(purgeTimer);
  await worker.close();
  await cancelWorker.close();
  await receivedQueue.close();
  metricsServer?.close();
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
