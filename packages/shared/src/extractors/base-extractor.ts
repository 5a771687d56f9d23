/**
 * Base SoF Step
 *
 * Abstract base class for the LLM-backed pipeline steps (extraction and
 * adjudication): template rendering, client and model selection.
 */

import { config } from '../config';
import { withContextFields } from '../context';
import { InvalidInputError } from '../errors';
import { getTemplateForStage, renderPrompt } from '../templates';
import type { PromptStage, PromptTemplate } from '../templates/types';
import type { SoFRecord } from '../types';
import { requestSofRecord } from './llm-extraction';
import { OpenAiLlmClient } from './openai-client';
import type { LlmClient, SofCallOptions, SofStepOptions } from './types';

/**
 * Reject document text the pipeline cannot work with.
 */
export function assertDocumentText(documentText: string): void {
  if (typeof documentText !== 'string' || documentText.trim() === '') {
    throw new InvalidInputError('Document text must be a non-empty string');
  }
}

export abstract class BaseSofStep {
  abstract readonly stage: PromptStage;

  readonly model: string;
  protected readonly client: LlmClient;
  protected readonly timeoutMs: number;

  constructor(model: string, options: SofStepOptions = {}) {
    this.model = model;
    this.client = options.client ?? new OpenAiLlmClient();
    this.timeoutMs = options.timeoutMs ?? config.llmRequestTimeoutMs;
  }

  /**
   * Get the prompt template for this step.
   */
  getTemplate(): PromptTemplate {
    return getTemplateForStage(this.stage);
  }

  /**
   * Render the template with the given values and request a validated record.
   */
  protected async invoke(
    values: Record<string, string>,
    temperature: number,
    options: SofCallOptions
  ): Promise<SoFRecord> {
    const template = this.getTemplate();

    const response = await withContextFields({ stage: this.stage }, () =>
      requestSofRecord(this.client, {
        stage: this.stage,
        model: this.model,
        systemPrompt: template.systemPrompt,
        userPrompt: renderPrompt(template.userPromptTemplate, values),
        temperature,
        timeoutMs: this.timeoutMs,
        signal: options.signal,
      })
    );

    return response.record;
  }
}
