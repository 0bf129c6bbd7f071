/**
 * Prometheus Metrics
 *
 * Pipeline metrics: job outcomes, stage latency, conversion attempts and
 * LLM usage. Worker processes expose them on /metrics.
 */

import http from 'node:http';
import type { Queue } from 'bullmq';
import * as promClient from 'prom-client';
import { logger } from './logger';

export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Queue Metrics
// ============================================================================

export const queueMetricsGauge = new promClient.Gauge({
  name: 'docintake_queue_jobs',
  help: 'Queue jobs by state',
  labelNames: ['queue', 'state'],
  registers: [register],
});

// ============================================================================
// Job Metrics
// ============================================================================

export const jobsFinishedCounter = new promClient.Counter({
  name: 'docintake_jobs_finished_total',
  help: 'Jobs that reached a terminal state',
  labelNames: ['state', 'reason'],
  registers: [register],
});

export const stageDurationHistogram = new promClient.Histogram({
  name: 'docintake_stage_duration_seconds',
  help: 'Duration of each pipeline stage',
  labelNames: ['stage'],
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

// ============================================================================
// Conversion Metrics
// ============================================================================

export const conversionAttemptsCounter = new promClient.Counter({
  name: 'docintake_conversion_attempts_total',
  help: 'Conversion attempts by provider and outcome',
  labelNames: ['provider', 'outcome'],
  registers: [register],
});

export const conversionScoreHistogram = new promClient.Histogram({
  name: 'docintake_conversion_quality_score',
  help: 'Quality score of conversion results',
  labelNames: ['provider'],
  buckets: [0.1, 0.2, 0.3, 0.4, 0.5, 0.6, 0.7, 0.8, 0.9, 1],
  registers: [register],
});

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'docintake_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'operation', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'docintake_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model', 'operation'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const llmTokensCounter = new promClient.Counter({
  name: 'docintake_llm_tokens_total',
  help: 'LLM tokens consumed',
  labelNames: ['model', 'direction'],
  registers: [register],
});

export const llmCostCounter = new promClient.Counter({
  name: 'docintake_llm_cost_usd_total',
  help: 'Estimated LLM spend in USD',
  labelNames: ['model', 'operation'],
  registers: [register],
});

// ============================================================================
// Database Metrics
// ============================================================================

export const dbQueryDurationHistogram = new promClient.Histogram({
  name: 'docintake_db_query_duration_seconds',
  help: 'Database operation duration',
  labelNames: ['operation'],
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [register],
});

/**
 * Report queue state counts to Prometheus gauges.
 */
export async function reportQueueMetrics(
  queues: Array<{ name: string; queue: Queue }>
): Promise<void> {
  for (const { name, queue } of queues) {
    try {
      const counts = await queue.getJobCounts('waiting', 'active', 'completed', 'failed', 'delayed');
      for (const [state, count] of Object.entries(counts)) {
        queueMetricsGauge.set({ queue: name, state }, count);
      }
    } catch (err) {
      logger.warn('Queue metrics unavailable', {
        queue: name,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

export async function getMetrics(): Promise<string> {
  return register.metrics();
}

export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 */
export function serveMetrics(port: number, beforeScrape?: () => Promise<void>): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end();
      return;
    }

    (beforeScrape ? beforeScrape() : Promise.resolve())
      .then(() => getMetrics())
      .then((body) => {
        res.setHeader('Content-Type', getMetricsContentType());
        res.end(body);
      })
      .catch((err: unknown) => {
        logger.error('Metrics scrape failed', err);
        res.statusCode = 500;
        res.end();
      });
  });

  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });

  return server;
}
