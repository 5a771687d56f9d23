/**
 * Pipeline Errors
 *
 * Every failure the extraction pipeline surfaces is one of these kinds.
 * They propagate unmodified from the LLM steps through the orchestrator.
 */

import type { ErrorEnvelope } from './types';

export type SofErrorCode =
  | 'missing_credential'
  | 'extraction_service_error'
  | 'schema_validation_error'
  | 'invalid_input';

export interface SofErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class SofPipelineError extends Error {
  readonly code: SofErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: SofErrorCode, message: string, options: SofErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.details = options.details;
  }
}

/**
 * No LLM credential configured. Fatal: never retried.
 */
export class MissingCredentialError extends SofPipelineError {
  constructor(variable: string = 'OPENAI_API_KEY') {
    super('missing_credential', `Missing ${variable} environment variable.`, {
      details: { variable },
    });
  }
}

/**
 * The LLM call failed: network fault, HTTP error, timeout, abort, refusal or
 * an empty completion.
 */
export class ExtractionServiceError extends SofPipelineError {
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: SofErrorOptions & { status?: number; timedOut?: boolean } = {}
  ) {
    super('extraction_service_error', message, options);
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

/**
 * The model output does not conform to the SoF record contract, even after the
 * raw JSON fallback.
 */
export class SchemaValidationError extends SofPipelineError {
  readonly errors: string[];

  constructor(message: string, errors: string[], options: SofErrorOptions = {}) {
    super('schema_validation_error', message, {
      ...options,
      details: { ...options.details, errors },
    });
    this.errors = errors;
  }
}

/**
 * Rejected before any network call: empty document text or an out-of-range temperature.
 */
export class InvalidInputError extends SofPipelineError {
  constructor(message: string) {
    super('invalid_input', message);
  }
}

export function isSofPipelineError(error: unknown): error is SofPipelineError {
  return error instanceof SofPipelineError;
}

/**
 * Map any thrown value to the error envelope used in worker failure logs.
 */
export function toErrorEnvelope(error: unknown, correlationId: string): ErrorEnvelope {
  return {
    error: {
      code: isSofPipelineError(error) ? error.code : 'internal_error',
      message: error instanceof Error ? error.message : 'Unknown error',
      correlation_id: correlationId,
    },
  };
}
