/**
 * LLM Step Types
 *
 * The seam between the pipeline steps and the LLM service. The OpenAI client
 * implements it in production; tests substitute an in-process fake.
 */

import type { SofResponseFormat } from '../schemas';
import type { PromptStage } from '../templates/types';

/**
 * One request to the LLM service
 */
export interface LlmCompletionRequest {
  /** Pipeline step issuing the call (for logs and metrics) */
  stage: PromptStage;
  /** LLM model identifier */
  model: string;
  systemPrompt: string;
  userPrompt: string;
  /** Structured Outputs shape the response must follow */
  responseFormat: SofResponseFormat;
  /** Sampling temperature in [0, 1] */
  temperature: number;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
  /** Aborts the in-flight request */
  signal?: AbortSignal;
}

/**
 * What the LLM service returned
 */
export interface LlmCompletion {
  /** Payload already decoded by the service's structured output, if it produced one */
  structured: unknown;
  /** Raw text of the completion */
  text: string;
  /** Model that served the request */
  model: string;
  /** Request ID from the provider */
  requestId: string;
  tokensUsed?: number;
}

export interface LlmClient {
  /**
   * Issue one completion. Rejects with MissingCredentialError before any
   * network activity when no credential is configured, and with
   * ExtractionServiceError when the service call fails.
   */
  complete(request: LlmCompletionRequest): Promise<LlmCompletion>;
}

/**
 * Construction options shared by the extraction and adjudication steps
 */
export interface SofStepOptions {
  /** LLM client (defaults to the OpenAI client) */
  client?: LlmClient;
  /** LLM model to use */
  model?: string;
  /** Request timeout in milliseconds */
  timeoutMs?: number;
}

/**
 * Per-call options
 */
export interface SofCallOptions {
  /** Aborts in-flight LLM requests when the caller abandons the operation */
  signal?: AbortSignal;
}
