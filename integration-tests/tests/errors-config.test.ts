/**
 * Error Envelope and Configuration Tests
 */

import {
  toErrorEnvelope,
  isSofPipelineError,
  parseTemperaturePair,
  getOpenAiApiKey,
  MissingCredentialError,
  ExtractionServiceError,
  InvalidInputError,
} from '@sof-extract/shared';

describe('toErrorEnvelope', () => {
  it('uses the pipeline error code', () => {
    expect(toErrorEnvelope(new MissingCredentialError(), 'corr-1')).toEqual({
      error: {
        code: 'missing_credential',
        message: 'Missing OPENAI_API_KEY environment variable.',
        correlation_id: 'corr-1',
      },
    });
  });

  it('maps unknown errors to internal_error', () => {
    expect(toErrorEnvelope(new Error('boom'), 'corr-2').error.code).toBe('internal_error');
    expect(toErrorEnvelope('boom', 'corr-3').error.message).toBe('Unknown error');
  });
});

describe('pipeline errors', () => {
  it('carry their class name and code', () => {
    const error = new InvalidInputError('Document text must be a non-empty string');

    expect(error.name).toBe('InvalidInputError');
    expect(error.code).toBe('invalid_input');
    expect(isSofPipelineError(error)).toBe(true);
    expect(isSofPipelineError(new Error('plain'))).toBe(false);
  });

  it('keep the underlying cause', () => {
    const cause = new Error('socket hang up');
    const error = new ExtractionServiceError('LLM request failed: socket hang up', { cause });

    expect(error.cause).toBe(cause);
    expect(error.timedOut).toBe(false);
  });
});

describe('parseTemperaturePair', () => {
  it('defaults to 0.0 and 0.3', () => {
    expect(parseTemperaturePair(undefined)).toEqual([0, 0.3]);
  });

  it('reads a comma-separated pair', () => {
    expect(parseTemperaturePair(' 0.1, 0.5 ')).toEqual([0.1, 0.5]);
  });

  it.each(['0.1', '0.1,0.2,0.3', 'a,b', '0.1,1.5'])('falls back on %p', (raw) => {
    expect(parseTemperaturePair(raw)).toEqual([0, 0.3]);
  });
});

describe('getOpenAiApiKey', () => {
  const originalKey = process.env.OPENAI_API_KEY;

  afterEach(() => {
    if (originalKey === undefined) {
      delete process.env.OPENAI_API_KEY;
    } else {
      process.env.OPENAI_API_KEY = originalKey;
    }
  });

  it('reads the key at call time', () => {
    process.env.OPENAI_API_KEY = 'test-secret';
    expect(getOpenAiApiKey()).toBe('test-secret');

    delete process.env.OPENAI_API_KEY;
    expect(getOpenAiApiKey()).toBeUndefined();
  });

  it('treats a blank key as unset', () => {
    process.env.OPENAI_API_KEY = '  ';
    expect(getOpenAiApiKey()).toBeUndefined();
  });
});
