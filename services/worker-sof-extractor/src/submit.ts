/**
 * Submit a Statement of Facts text file to the extract_sof queue.
 *
 * Usage: submit <path-to-text-file> [file-name]
 */

import fs from 'fs';
import path from 'path';
import { ulid } from 'ulid';
import {
  logger,
  createQueue,
  QUEUE_NAMES,
  type ExtractSofJob,
  type SofExtractionOutput,
} from '@sof-extract/shared';

async function main(): Promise<void> {
  const [textPath, fileNameArg] = process.argv.slice(2);
  if (!textPath) {
    throw new Error('Usage: submit <path-to-text-file> [file-name]');
  }

  const documentText = fs.readFileSync(textPath, 'utf-8');
  const documentId = ulid();

  const job: ExtractSofJob = {
    event_type: 'document.text_available',
    correlation_id: ulid(),
    document_id: documentId,
    file_name: fileNameArg || path.basename(textPath),
    document_text: documentText,
  };

  const queue = createQueue<ExtractSofJob, SofExtractionOutput>(QUEUE_NAMES.EXTRACT_SOF);
  try {
    await queue.add('extract_sof', job, { jobId: `sof_${documentId}` });
    logger.info('Enqueued extract_sof', {
      document_id: documentId,
      file_name: job.file_name,
      text_length: documentText.length,
    });
  } finally {
    await queue.close();
  }
}

main().catch((error: unknown) => {
  logger.error('Submit failed', error);
  process.exit(1);
});
