/**
 * extract_sof Job Processing
 *
 * Runs the pipeline for one document, attaches the file name, and records
 * the output snapshot. Retries are left to BullMQ job attempts; errors that
 * cannot succeed on retry fail the job immediately.
 */

import { Job, UnrecoverableError } from 'bullmq';
import {
  logger,
  runWithContextAsync,
  toErrorEnvelope,
  InvalidInputError,
  MissingCredentialError,
  QUEUE_NAMES,
  documentsProcessedCounter,
  jobDurationHistogram,
  jobsProcessedCounter,
  type ExtractSofJob,
  type SofExtractionOutput,
  type SofPipeline,
} from '@sof-extract/shared';
import type { OutputSnapshot } from './snapshot';

/** The parts of a BullMQ job the processor reads */
export type ExtractSofJobHandle = Pick<
  Job<ExtractSofJob, SofExtractionOutput>,
  'id' | 'data' | 'attemptsMade'
>;

export interface ExtractSofProcessorDeps {
  pipeline: Pick<SofPipeline, 'process'>;
  snapshot: Pick<OutputSnapshot, 'append' | 'scheduleWipe'>;
}

function isUnrecoverable(error: unknown): boolean {
  return error instanceof MissingCredentialError || error instanceof InvalidInputError;
}

/**
 * Build the extract_sof job processor
 */
export function createExtractSofProcessor(
  deps: ExtractSofProcessorDeps
): (job: ExtractSofJobHandle) => Promise<SofExtractionOutput> {
  return async (job) => {
    const { correlation_id, document_id, file_name, document_text } = job.data;

    return runWithContextAsync(
      { correlationId: correlation_id, documentId: document_id, fileName: file_name },
      async () => {
        const startTime = Date.now();

        logger.info('Processing extract_sof', {
          jobId: job.id,
          document_id,
          file_name,
          text_length: document_text.length,
          attempt: job.attemptsMade + 1,
        });

        try {
          const record = await deps.pipeline.process(document_text);
          const output: SofExtractionOutput = { ...record, fileName: file_name };

          await deps.snapshot.append(output);
          deps.snapshot.scheduleWipe();

          const duration = (Date.now() - startTime) / 1000;
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_SOF, status: 'success' });
          jobDurationHistogram.observe({ queue: QUEUE_NAMES.EXTRACT_SOF, status: 'success' }, duration);
          documentsProcessedCounter.inc({ status: 'success' });

          logger.info('SoF extraction job complete', {
            document_id,
            event_count: output.events.length,
            duration_seconds: duration,
          });

          return output;
        } catch (error) {
          const duration = (Date.now() - startTime) / 1000;
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_SOF, status: 'failed' });
          jobDurationHistogram.observe({ queue: QUEUE_NAMES.EXTRACT_SOF, status: 'failed' }, duration);
          documentsProcessedCounter.inc({ status: 'error' });

          const envelope = toErrorEnvelope(error, correlation_id);
          logger.error('SoF extraction job failed', error, {
            error_code: envelope.error.code,
            unrecoverable: isUnrecoverable(error),
          });

          if (isUnrecoverable(error)) {
            throw new UnrecoverableError(error instanceof Error ? error.message : String(error));
          }
          throw error;
        }
      }
    );
  };
}
