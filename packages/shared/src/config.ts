/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * The LLM credential is not part of it: getOpenAiApiKey() reads it per call.
 */

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  maxJobAttempts: number;
  backoffBaseMs: number;

  // LLM
  llmModelExtraction: string;
  llmModelAdjudication: string;
  llmRequestTimeoutMs: number;

  // Pipeline
  extractionTemperatures: [number, number];
  parallelExtraction: boolean;

  // Output snapshot
  outputSnapshotPath: string;
  outputSnapshotTtlMs: number;

  // Metrics
  metricsPort: number;
}

/**
 * Parse a "low,high" temperature pair. Falls back to the default pair when the
 * value is missing or malformed.
 */
export function parseTemperaturePair(
  raw: string | undefined,
  fallback: [number, number] = [0.0, 0.3]
): [number, number] {
  if (!raw) return fallback;

  const parts = raw.split(',').map((p) => parseFloat(p.trim()));
  if (parts.length !== 2 || parts.some((p) => Number.isNaN(p) || p < 0 || p > 1)) {
    return fallback;
  }

  return [parts[0], parts[1]];
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '2', 10),
  maxJobAttempts: parseInt(process.env.BULLMQ_DEFAULT_ATTEMPTS || '3', 10),
  backoffBaseMs: parseInt(process.env.BACKOFF_BASE_MS || '2000', 10),

  // LLM
  llmModelExtraction: process.env.LLM_MODEL_EXTRACTION || 'gpt-4o',
  llmModelAdjudication: process.env.LLM_MODEL_ADJUDICATION || 'gpt-4o',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '120000', 10),

  // Pipeline
  extractionTemperatures: parseTemperaturePair(process.env.SOF_EXTRACTION_TEMPERATURES),
  parallelExtraction: process.env.SOF_PARALLEL_EXTRACTION !== 'false',

  // Output snapshot
  outputSnapshotPath: process.env.OUTPUT_SNAPSHOT_PATH || 'output.json',
  outputSnapshotTtlMs: parseInt(process.env.OUTPUT_SNAPSHOT_TTL_MS || '60000', 10),

  // Metrics
  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),
};

/**
 * Read the OpenAI credential from the environment at call time.
 * Returns undefined when it is unset or blank.
 */
export function getOpenAiApiKey(): string | undefined {
  const key = process.env.OPENAI_API_KEY?.trim();
  return key ? key : undefined;
}
