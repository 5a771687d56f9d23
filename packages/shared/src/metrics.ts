/**
 * Prometheus Metrics
 *
 * Metrics for LLM calls, pipeline runs and job processing.
 */

import http from 'node:http';
import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

/**
 * Default process metrics (CPU, memory, etc.). Called by long-running
 * processes only; wrapped to avoid crashes on Alpine/restricted environments.
 */
export function registerDefaultMetrics(): void {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'sof_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [1, 5, 10, 30, 60, 120, 300],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'sof_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsProcessedCounter = new promClient.Counter({
  name: 'sof_documents_processed_total',
  help: 'Total number of documents processed through the pipeline',
  labelNames: ['status'],
  registers: [register],
});

export const pipelineDurationHistogram = new promClient.Histogram({
  name: 'sof_pipeline_duration_seconds',
  help: 'Duration of a full extract, extract, adjudicate run',
  buckets: [5, 10, 20, 30, 60, 120, 300],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'sof_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'stage', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'sof_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model', 'stage'],
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const schemaFallbacksCounter = new promClient.Counter({
  name: 'sof_schema_fallbacks_total',
  help: 'LLM responses whose structured payload failed validation and were re-read as raw JSON',
  labelNames: ['stage'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Uses Node built-in http - no express required.
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((error: unknown) => {
          logger.error('Failed to render metrics', error);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
