/**
 * Shared LLM Extraction Logic
 *
 * Issues one LLM call for a pipeline step and decodes the completion into a
 * validated SoF record. Decoding is two-stage:
 * 1. The service's structured payload, validated against the contract
 * 2. Fallback: the raw completion text read as JSON, then validated
 */

import { logger } from '../logger';
import { isSofPipelineError, SchemaValidationError } from '../errors';
import { normalizeEvents } from '../event-timing';
import { buildSofResponseFormat, validateSofRecord } from '../schemas';
import {
  llmRequestsCounter,
  llmRequestDurationHistogram,
  schemaFallbacksCounter,
} from '../metrics';
import type { SoFRecord } from '../types';
import type { PromptStage } from '../templates/types';
import type { LlmClient, LlmCompletion } from './types';

/**
 * Parameters for one SoF record request
 */
export interface SofRecordRequest {
  stage: PromptStage;
  model: string;
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * SoF record response with metadata
 */
export interface SofRecordResponse {
  /** Validated, event-normalized record */
  record: SoFRecord;
  /** LLM model used */
  model: string;
  /** Request ID from the provider */
  requestId: string;
  /** Whether the raw text fallback produced the record */
  usedFallback: boolean;
  /** Duration in milliseconds */
  durationMs: number;
}

/**
 * Read the JSON object out of raw completion text. Tolerates markdown code
 * fences and prose around the object.
 *
 * @throws SchemaValidationError when no JSON can be read
 */
export function extractJsonPayload(text: string): unknown {
  let candidate = text.trim();

  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start !== -1 && end > start) {
    candidate = candidate.slice(start, end + 1);
  }

  try {
    return JSON.parse(candidate);
  } catch (error) {
    throw new SchemaValidationError(
      'LLM response is neither schema-conforming nor parsable JSON',
      [error instanceof Error ? error.message : String(error)],
      { cause: error }
    );
  }
}

function finalizeRecord(record: SoFRecord): SoFRecord {
  return { ...record, events: normalizeEvents(record.events) };
}

/**
 * Decode a completion into a validated SoF record.
 *
 * @throws SchemaValidationError when neither stage yields a conforming record
 */
export function decodeSofCompletion(
  completion: LlmCompletion,
  stage: PromptStage
): { record: SoFRecord; usedFallback: boolean } {
  if (completion.structured !== undefined) {
    const structured = validateSofRecord(completion.structured);
    if (structured.valid) {
      return { record: finalizeRecord(structured.value), usedFallback: false };
    }

    logger.warn('Structured LLM payload failed validation, re-reading raw text', {
      stage,
      request_id: completion.requestId,
      errors: structured.errors,
    });
  }

  schemaFallbacksCounter.inc({ stage });

  const payload = extractJsonPayload(completion.text);
  const fallback = validateSofRecord(payload);

  if (!fallback.valid) {
    throw new SchemaValidationError(
      `LLM ${stage} response does not conform to the SoF record schema`,
      fallback.errors,
      { details: { stage, request_id: completion.requestId } }
    );
  }

  return { record: finalizeRecord(fallback.value), usedFallback: true };
}

/**
 * Request a SoF record from the LLM for one pipeline step.
 *
 * @param client - LLM client
 * @param request - Prompts, model and sampling settings
 * @returns Validated record with metadata
 */
export async function requestSofRecord(
  client: LlmClient,
  request: SofRecordRequest
): Promise<SofRecordResponse> {
  const { stage, model } = request;
  const responseFormat = buildSofResponseFormat();

  logger.info('Requesting SoF record from LLM', {
    stage,
    model,
    temperature: request.temperature,
    prompt_length: request.userPrompt.length,
  });

  const startTime = Date.now();
  let completion: LlmCompletion;

  try {
    completion = await client.complete({ ...request, responseFormat });
  } catch (error) {
    const durationMs = Date.now() - startTime;
    llmRequestDurationHistogram.observe({ model, stage }, durationMs / 1000);
    llmRequestsCounter.inc({
      model,
      stage,
      status: isSofPipelineError(error) ? error.code : 'error',
    });

    logger.error('LLM request failed', error, {
      stage,
      model,
      duration_ms: durationMs,
    });

    throw error;
  }

  const durationMs = Date.now() - startTime;
  llmRequestDurationHistogram.observe({ model, stage }, durationMs / 1000);
  llmRequestsCounter.inc({ model, stage, status: 'success' });

  logger.info('LLM request complete', {
    stage,
    model: completion.model,
    request_id: completion.requestId,
    duration_ms: durationMs,
    tokens_used: completion.tokensUsed,
  });

  const { record, usedFallback } = decodeSofCompletion(completion, stage);

  logger.debug('Decoded SoF record', {
    stage,
    request_id: completion.requestId,
    event_count: record.events.length,
    used_fallback: usedFallback,
  });

  return {
    record,
    model: completion.model,
    requestId: completion.requestId,
    usedFallback,
    durationMs,
  };
}
