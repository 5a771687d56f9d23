/**
 * Prompt Template Types
 *
 * Defines the interface for the prompts that drive each LLM step of the pipeline.
 */

export type PromptStage = 'extraction' | 'adjudication';

/**
 * Prompt template for one pipeline step.
 */
export interface PromptTemplate {
  /** The pipeline step this template drives */
  stage: PromptStage;

  /** System prompt with the step's rules */
  systemPrompt: string;

  /**
   * User prompt template with {{placeholder}} slots, filled by renderPrompt():
   * - {{document_text}}: The Statement of Facts text (both steps)
   * - {{extraction_1}}, {{extraction_2}}: Candidate records as JSON (adjudication only)
   */
  userPromptTemplate: string;

  /** Human-readable description of what this template produces */
  description: string;
}
