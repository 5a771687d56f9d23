/**
 * SoF Extraction Steps
 *
 * Extraction and adjudication steps, plus module-level shortcuts backed by
 * default OpenAI-driven instances.
 */

import type { SoFRecord } from '../types';
import { SofAdjudicator } from './sof-adjudicator';
import { SofExtractor } from './sof-extractor';
import type { SofCallOptions } from './types';

// Types
export type {
  LlmClient,
  LlmCompletion,
  LlmCompletionRequest,
  SofStepOptions,
  SofCallOptions,
} from './types';
export type { SofRecordRequest, SofRecordResponse } from './llm-extraction';

// Steps
export { BaseSofStep, assertDocumentText } from './base-extractor';
export { SofExtractor } from './sof-extractor';
export { SofAdjudicator, ADJUDICATION_TEMPERATURE } from './sof-adjudicator';

// LLM utilities
export { OpenAiLlmClient, type OpenAiLlmClientOptions } from './openai-client';
export { requestSofRecord, decodeSofCompletion, extractJsonPayload } from './llm-extraction';

let defaultExtractor: SofExtractor | null = null;
let defaultAdjudicator: SofAdjudicator | null = null;

/**
 * Extract a SoF record with the default extractor.
 */
export function extract(
  documentText: string,
  temperature: number,
  options?: SofCallOptions
): Promise<SoFRecord> {
  if (!defaultExtractor) {
    defaultExtractor = new SofExtractor();
  }
  return defaultExtractor.extract(documentText, temperature, options);
}

/**
 * Adjudicate two candidates with the default adjudicator.
 */
export function adjudicate(
  documentText: string,
  candidateA: SoFRecord,
  candidateB: SoFRecord,
  options?: SofCallOptions
): Promise<SoFRecord> {
  if (!defaultAdjudicator) {
    defaultAdjudicator = new SofAdjudicator();
  }
  return defaultAdjudicator.adjudicate(documentText, candidateA, candidateB, options);
}
