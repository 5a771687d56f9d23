/**
 * SoF Adjudicator
 *
 * Reconciles two candidate extractions into one final record, with the
 * document text as ground truth. Always runs at temperature 0.
 */

import { config } from '../config';
import { logger } from '../logger';
import type { SoFRecord } from '../types';
import { assertDocumentText, BaseSofStep } from './base-extractor';
import type { SofCallOptions, SofStepOptions } from './types';

export const ADJUDICATION_TEMPERATURE = 0;

function formatCandidate(candidate: SoFRecord): string {
  return JSON.stringify(candidate, null, 2);
}

export class SofAdjudicator extends BaseSofStep {
  readonly stage = 'adjudication' as const;

  constructor(options: SofStepOptions = {}) {
    super(
      options.model || process.env.LLM_MODEL_ADJUDICATION || config.llmModelAdjudication,
      options
    );
  }

  /**
   * Adjudicate two candidate records against the document text.
   *
   * @param documentText - Statement of Facts text (ground truth)
   * @param candidateA - First extraction
   * @param candidateB - Second, independent extraction
   * @throws InvalidInputError, MissingCredentialError, ExtractionServiceError, SchemaValidationError
   */
  async adjudicate(
    documentText: string,
    candidateA: SoFRecord,
    candidateB: SoFRecord,
    options: SofCallOptions = {}
  ): Promise<SoFRecord> {
    assertDocumentText(documentText);

    logger.info('Starting SoF adjudication', {
      model: this.model,
      candidate_event_counts: [candidateA.events.length, candidateB.events.length],
    });

    const record = await this.invoke(
      {
        document_text: documentText,
        extraction_1: formatCandidate(candidateA),
        extraction_2: formatCandidate(candidateB),
      },
      ADJUDICATION_TEMPERATURE,
      options
    );

    logger.info('SoF adjudication complete', {
      event_count: record.events.length,
    });

    return record;
  }
}
