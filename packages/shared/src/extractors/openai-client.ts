/**
 * OpenAI LLM Client
 *
 * Chat Completions with Structured Outputs (json_schema). A fresh SDK client
 * is built per call so a rotated OPENAI_API_KEY takes effect on the next request.
 */

import OpenAI, { APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai';
import { getOpenAiApiKey } from '../config';
import { ExtractionServiceError, MissingCredentialError } from '../errors';
import { logger } from '../logger';
import type { LlmClient, LlmCompletion, LlmCompletionRequest } from './types';

export interface OpenAiLlmClientOptions {
  /** Override the API base URL (uses OPENAI_BASE_URL or the public endpoint if not provided) */
  baseURL?: string;
}

function toServiceError(error: unknown): ExtractionServiceError {
  if (error instanceof APIUserAbortError) {
    return new ExtractionServiceError('LLM request aborted', { cause: error });
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new ExtractionServiceError('LLM request timed out', { cause: error, timedOut: true });
  }
  if (error instanceof APIError) {
    return new ExtractionServiceError(`LLM service error: ${error.message}`, {
      cause: error,
      status: error.status,
    });
  }
  return new ExtractionServiceError(
    `LLM request failed: ${error instanceof Error ? error.message : String(error)}`,
    { cause: error }
  );
}

function parseStructuredContent(content: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    logger.debug('Completion content is not bare JSON, deferring to raw text decoding', {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

export class OpenAiLlmClient implements LlmClient {
  private readonly baseURL?: string;

  constructor(options: OpenAiLlmClientOptions = {}) {
    this.baseURL = options.baseURL;
  }

  async complete(request: LlmCompletionRequest): Promise<LlmCompletion> {
    const apiKey = getOpenAiApiKey();
    if (!apiKey) {
      throw new MissingCredentialError('OPENAI_API_KEY');
    }

    const openai = new OpenAI({
      apiKey,
      baseURL: this.baseURL,
      timeout: request.timeoutMs,
      maxRetries: 0, // Disable SDK retries - retry policy belongs to the job queue
    });

    const response = await openai.chat.completions
      .create(
        {
          model: request.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
          ],
          response_format: {
            type: 'json_schema',
            json_schema: request.responseFormat,
          },
          temperature: request.temperature,
        },
        { signal: request.signal }
      )
      .catch((error: unknown) => {
        throw toServiceError(error);
      });

    const choice = response.choices[0];
    const message = choice?.message;

    if (message?.refusal) {
      throw new ExtractionServiceError(`LLM refused the request: ${message.refusal}`);
    }

    const content = message?.content;
    if (!content || !content.trim()) {
      throw new ExtractionServiceError('Empty response from OpenAI');
    }

    return {
      // A truncated completion (finish_reason "length") is never treated as structured output
      structured: choice.finish_reason === 'stop' ? parseStructuredContent(content) : undefined,
      text: content,
      model: response.model || request.model,
      requestId: response.id || `req_${Date.now()}`,
      tokensUsed: response.usage?.total_tokens,
    };
  }
}
