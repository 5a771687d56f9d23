/**
 * Job Context
 *
 * Carries the correlation ID, the document being processed and the active
 * pipeline step through the three LLM calls of a job, via AsyncLocalStorage.
 * Logs read it so every line of a job can be joined on correlationId.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';
import type { PromptStage } from './templates/types';

export interface RequestContext {
  correlationId: string;
  documentId?: string;
  fileName?: string;
  /** Pipeline step issuing LLM calls, set by the steps themselves */
  stage?: PromptStage;
}

const jobContext = new AsyncLocalStorage<RequestContext>();

export function getContext(): RequestContext | undefined {
  return jobContext.getStore();
}

/**
 * Correlation ID of the current job, or a fresh one outside any job
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

/**
 * Run an async function as a new job context
 */
export async function runWithContextAsync<T>(
  context: RequestContext,
  fn: () => Promise<T>
): Promise<T> {
  return jobContext.run(context, fn);
}

/**
 * Run an async function with extra fields layered over the current context.
 * Outside any job a correlation ID is generated for the new context.
 */
export async function withContextFields<T>(
  fields: Omit<Partial<RequestContext>, 'correlationId'>,
  fn: () => Promise<T>
): Promise<T> {
  const parent = getContext();
  return jobContext.run(
    { ...parent, ...fields, correlationId: parent?.correlationId || ulid() },
    fn
  );
}
