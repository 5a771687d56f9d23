/**
 * SoF Extractor Worker
 *
 * Consumes extract_sof jobs: dual-pass extraction plus adjudication for each
 * document, output snapshot with a privacy wipe, /metrics for scraping.
 */

import {
  logger,
  config,
  createWorker,
  registerDefaultMetrics,
  serveMetrics,
  QUEUE_NAMES,
  SofPipeline,
  type ExtractSofJob,
  type SofExtractionOutput,
} from '@sof-extract/shared';
import { createExtractSofProcessor } from './lib/process-job';
import { OutputSnapshot } from './lib/snapshot';

const pipeline = new SofPipeline();
const snapshot = new OutputSnapshot(config.outputSnapshotPath, config.outputSnapshotTtlMs);

registerDefaultMetrics();
const metricsServer = serveMetrics(config.metricsPort);

const worker = createWorker<ExtractSofJob, SofExtractionOutput>(
  QUEUE_NAMES.EXTRACT_SOF,
  createExtractSofProcessor({ pipeline, snapshot })
);

logger.info('SoF extractor worker started', {
  temperatures: pipeline.temperatures,
  parallel_extraction: pipeline.parallelExtraction,
  snapshot_path: snapshot.filePath,
});

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await snapshot.close();
  metricsServer.close();
  process.exit(0);
}

function onSignal(signal: string): void {
  shutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));
