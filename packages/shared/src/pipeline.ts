/**
 * SoF Pipeline
 *
 * Dual-pass extraction and adjudication:
 * 1. Two independent extractions (temperatures 0.0 and 0.3 by default)
 * 2. One adjudication over the document text and both candidates
 *
 * The extractions share no state and run concurrently unless configured
 * otherwise; adjudication waits for both. Errors propagate unmodified and
 * nothing is retried here.
 */

import { config } from './config';
import { logger } from './logger';
import { pipelineDurationHistogram } from './metrics';
import { SofAdjudicator } from './extractors/sof-adjudicator';
import { SofExtractor } from './extractors/sof-extractor';
import type { LlmClient, SofCallOptions } from './extractors/types';
import type { SoFRecord } from './types';

const PREVIEW_CHARS = 500;

export interface SofPipelineOptions {
  /** LLM client shared by the default extractor and adjudicator */
  client?: LlmClient;
  extractor?: SofExtractor;
  adjudicator?: SofAdjudicator;
  /** Temperatures of the two extraction passes */
  temperatures?: [number, number];
  /** Run both extraction passes concurrently */
  parallelExtraction?: boolean;
}

export class SofPipeline {
  readonly temperatures: [number, number];
  readonly parallelExtraction: boolean;

  private readonly extractor: SofExtractor;
  private readonly adjudicator: SofAdjudicator;

  constructor(options: SofPipelineOptions = {}) {
    this.extractor = options.extractor ?? new SofExtractor({ client: options.client });
    this.adjudicator = options.adjudicator ?? new SofAdjudicator({ client: options.client });
    this.temperatures = options.temperatures ?? config.extractionTemperatures;
    this.parallelExtraction = options.parallelExtraction ?? config.parallelExtraction;
  }

  /**
   * Run both extraction passes and adjudicate them into the final record.
   *
   * @param documentText - Statement of Facts text
   * @returns The adjudicated record, unmodified
   */
  async process(documentText: string, options: SofCallOptions = {}): Promise<SoFRecord> {
    const endTimer = pipelineDurationHistogram.startTimer();

    logger.info('Starting SoF pipeline', {
      text_length: documentText.length,
      temperatures: this.temperatures,
      parallel_extraction: this.parallelExtraction,
    });
    logger.debug('Document text preview', {
      preview: documentText.slice(0, PREVIEW_CHARS),
    });

    try {
      const [candidateA, candidateB] = await this.runExtractions(documentText, options.signal);
      const final = await this.adjudicator.adjudicate(documentText, candidateA, candidateB, options);

      const durationSeconds = endTimer();
      logger.info('SoF pipeline complete', {
        event_count: final.events.length,
        duration_seconds: durationSeconds,
      });

      return final;
    } catch (error) {
      logger.error('SoF pipeline failed', error, {
        text_length: documentText.length,
      });
      throw error;
    }
  }

  private async runExtractions(
    documentText: string,
    signal?: AbortSignal
  ): Promise<[SoFRecord, SoFRecord]> {
    const [first, second] = this.temperatures;

    if (!this.parallelExtraction) {
      const candidateA = await this.extractor.extract(documentText, first, { signal });
      const candidateB = await this.extractor.extract(documentText, second, { signal });
      return [candidateA, candidateB];
    }

    // One failed pass aborts its sibling; the caller's signal aborts both
    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const run = (temperature: number): Promise<SoFRecord> =>
      this.extractor
        .extract(documentText, temperature, { signal: controller.signal })
        .catch((error: unknown) => {
          controller.abort(error);
          throw error;
        });

    try {
      return await Promise.all([run(first), run(second)]);
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }
}

let defaultPipeline: SofPipeline | null = null;

/**
 * Process a document with the default OpenAI-backed pipeline.
 */
export function processSofDocument(
  documentText: string,
  options?: SofCallOptions
): Promise<SoFRecord> {
  if (!defaultPipeline) {
    defaultPipeline = new SofPipeline();
  }
  return defaultPipeline.process(documentText, options);
}
