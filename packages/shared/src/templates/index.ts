/**
 * Prompt Templates
 *
 * Two-pass extraction approach:
 * 1. Extraction: the same template run twice at different temperatures
 * 2. Adjudication: one call reconciling both candidates against the text
 */

import type { PromptStage, PromptTemplate } from './types';
import { SOF_EXTRACTION_TEMPLATE } from './sof-extraction.template';
import { SOF_ADJUDICATION_TEMPLATE } from './sof-adjudication.template';

// Export types
export type { PromptStage, PromptTemplate } from './types';

// Export individual templates
export { SOF_EXTRACTION_TEMPLATE, SOF_ADJUDICATION_TEMPLATE };

/**
 * Map of pipeline steps to their prompt templates
 */
const TEMPLATES: Record<PromptStage, PromptTemplate> = {
  extraction: SOF_EXTRACTION_TEMPLATE,
  adjudication: SOF_ADJUDICATION_TEMPLATE,
};

/**
 * Get the prompt template for a pipeline step.
 */
export function getTemplateForStage(stage: PromptStage): PromptTemplate {
  return TEMPLATES[stage];
}

/**
 * Fill the {{placeholder}} slots of a template's user prompt.
 * Values are inserted verbatim and not re-scanned; unknown placeholders are left in place.
 */
export function renderPrompt(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : placeholder
  );
}
