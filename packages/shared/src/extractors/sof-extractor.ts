/**
 * SoF Extractor
 *
 * A single extraction pass over the document text at a given temperature.
 * Lower temperatures bias toward literal extraction, higher ones toward recall.
 */

import { config } from '../config';
import { InvalidInputError } from '../errors';
import { logger } from '../logger';
import type { SoFRecord } from '../types';
import { assertDocumentText, BaseSofStep } from './base-extractor';
import type { SofCallOptions, SofStepOptions } from './types';

export class SofExtractor extends BaseSofStep {
  readonly stage = 'extraction' as const;

  constructor(options: SofStepOptions = {}) {
    super(
      options.model || process.env.LLM_MODEL_EXTRACTION || config.llmModelExtraction,
      options
    );
  }

  /**
   * Extract a SoF record from document text.
   *
   * @param documentText - Statement of Facts text
   * @param temperature - Sampling temperature in [0, 1]
   * @throws InvalidInputError, MissingCredentialError, ExtractionServiceError, SchemaValidationError
   */
  async extract(
    documentText: string,
    temperature: number,
    options: SofCallOptions = {}
  ): Promise<SoFRecord> {
    assertDocumentText(documentText);
    if (!Number.isFinite(temperature) || temperature < 0 || temperature > 1) {
      throw new InvalidInputError(`Temperature must be within [0, 1], got ${temperature}`);
    }

    logger.info('Starting SoF extraction', {
      model: this.model,
      temperature,
      text_length: documentText.length,
    });

    const record = await this.invoke({ document_text: documentText }, temperature, options);

    logger.info('SoF extraction complete', {
      temperature,
      event_count: record.events.length,
      vessel_name: record.document_details.vessel_name ?? null,
    });

    return record;
  }
}
