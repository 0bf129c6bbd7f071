/**
 * Database Operations
 *
 * Postgres-backed job snapshots, usage ledger and processing log.
 */

import { Pool } from 'pg';
import {
  logger,
  dbQueryDurationHistogram,
  TERMINAL_STATES,
  type JobSnapshot,
  type JobState,
  type LogDetail,
  type PipelinePersistence,
  type UsageRecord,
} from '@docintake/shared';
import type { CancellationStore } from './cancellation';

export function createPool(connectionString: string): Pool {
  return new Pool({
    connectionString,
    max: 20,
    idleTimeoutMillis: 30000,
  });
}

async function timedQuery<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  try {
    return await fn();
  } finally {
    dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
  }
}

export class PgPersistence implements PipelinePersistence {
  constructor(private readonly pool: Pool) {}

  /**
   * Upsert the job row with its latest state; the outcome is written once
   * the job is terminal.
   */
  async save(snapshot: JobSnapshot): Promise<void> {
    const { job, outcome } = snapshot;

    await timedQuery('save_snapshot', () =>
      this.pool.query(
        `INSERT INTO document_jobs (job_id, correlation_id, caller_id, mime_type, filename, raw_uri, size_bytes, state, flags, failure, outcome, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
         ON CONFLICT (job_id) DO UPDATE SET
           state = EXCLUDED.state,
           flags = EXCLUDED.flags,
           failure = EXCLUDED.failure,
           outcome = COALESCE(EXCLUDED.outcome, document_jobs.outcome),
           updated_at = EXCLUDED.updated_at`,
        [
          job.id,
          job.correlationId,
          job.callerId,
          job.mimeType,
          job.filename ?? null,
          job.rawUri ?? null,
          job.sizeBytes,
          job.state,
          job.flags,
          job.failure ? JSON.stringify(job.failure) : null,
          outcome ? JSON.stringify(outcome) : null,
          job.createdAt,
          job.updatedAt,
        ]
      )
    );
  }

  async appendUsageRecord(record: UsageRecord): Promise<void> {
    await timedQuery('append_usage', () =>
      this.pool.query(
        `INSERT INTO usage_ledger (job_id, correlation_id, operation, provider, model, input_tokens, output_tokens, pages, cost_usd, success, duration_ms, attempt, created_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)`,
        [
          record.jobId ?? null,
          record.correlationId,
          record.operation,
          record.provider,
          record.model,
          record.inputTokens,
          record.outputTokens,
          record.pages ?? null,
          record.costUsd,
          record.success,
          record.durationMs,
          record.attempt,
          record.createdAt,
        ]
      )
    );
  }

  async appendLog(correlationId: string, stage: JobState, detail: LogDetail): Promise<void> {
    await timedQuery('append_log', () =>
      this.pool.query(
        `INSERT INTO processing_log (correlation_id, stage, detail)
         VALUES ($1, $2, $3)`,
        [correlationId, stage, JSON.stringify(detail)]
      )
    );
  }
}

/**
 * Cancellation requests shared by every worker replica.
 */
export class PgCancellationStore implements CancellationStore {
  constructor(private readonly pool: Pool) {}

  async isFinished(jobId: string): Promise<boolean> {
    const result = await timedQuery('job_finished', () =>
      this.pool.query<{ job_id: string }>(
        `SELECT job_id FROM document_jobs WHERE job_id = $1 AND state = ANY($2::text[])`,
        [jobId, TERMINAL_STATES]
      )
    );
    return result.rows.length > 0;
  }

  async request(jobId: string, expiresAt: Date): Promise<void> {
    await timedQuery('request_cancel', () =>
      this.pool.query(
        `INSERT INTO cancellation_requests (job_id, expires_at)
         VALUES ($1, $2)
         ON CONFLICT (job_id) DO UPDATE SET expires_at = EXCLUDED.expires_at`,
        [jobId, expiresAt.toISOString()]
      )
    );
  }

  async expiryOf(jobId: string): Promise<Date | undefined> {
    const result = await timedQuery('check_cancel', () =>
      this.pool.query<{ expires_at: Date }>(`SELECT expires_at FROM cancellation_requests WHERE job_id = $1`, [jobId])
    );
    return result.rows[0]?.expires_at;
  }

  async clear(jobId: string): Promise<void> {
    await timedQuery('clear_cancel', () =>
      this.pool.query(`DELETE FROM cancellation_requests WHERE job_id = $1`, [jobId])
    );
  }
}

/**
 * Delete terminal jobs older than the retention window, with their
 * processing log, and expired cancellation requests. The usage ledger is kept.
 * @returns number of jobs removed
 */
export async function purgeExpiredJobs(pool: Pool, retentionDays: number): Promise<number> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');

    const expired = await client.query<{ correlation_id: string }>(
      `DELETE FROM document_jobs
       WHERE state = ANY($1::text[])
         AND updated_at < NOW() - make_interval(days => $2)
       RETURNING correlation_id`,
      [TERMINAL_STATES, retentionDays]
    );

    const correlationIds = expired.rows.map((row) => row.correlation_id);
    if (correlationIds.length > 0) {
      await client.query(`DELETE FROM processing_log WHERE correlation_id = ANY($1::text[])`, [correlationIds]);
    }

    await client.query(`DELETE FROM cancellation_requests WHERE expires_at < NOW()`);

    await client.query('COMMIT');

    logger.info('Purged expired jobs', { count: correlationIds.length, retention_days: retentionDays });
    return correlationIds.length;
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error('Failed to purge expired jobs', error, { retention_days: retentionDays });
    throw error;
  } finally {
    client.release();
  }
}
