/**
 * Prompt Template Tests
 */

import {
  getTemplateForStage,
  renderPrompt,
  SOF_EXTRACTION_TEMPLATE,
  SOF_ADJUDICATION_TEMPLATE,
} from '@sof-extract/shared';

describe('getTemplateForStage', () => {
  it('maps each pipeline step to its template', () => {
    expect(getTemplateForStage('extraction')).toBe(SOF_EXTRACTION_TEMPLATE);
    expect(getTemplateForStage('adjudication')).toBe(SOF_ADJUDICATION_TEMPLATE);
  });

  it('declares the placeholders each step fills', () => {
    expect(SOF_EXTRACTION_TEMPLATE.userPromptTemplate).toContain('{{document_text}}');
    expect(SOF_ADJUDICATION_TEMPLATE.userPromptTemplate).toContain('{{document_text}}');
    expect(SOF_ADJUDICATION_TEMPLATE.userPromptTemplate).toContain('{{extraction_1}}');
    expect(SOF_ADJUDICATION_TEMPLATE.userPromptTemplate).toContain('{{extraction_2}}');
  });
});

describe('renderPrompt', () => {
  it('fills every occurrence of a placeholder', () => {
    expect(renderPrompt('{{a}} and {{a}}', { a: 'x' })).toBe('x and x');
  });

  it('leaves unknown placeholders in place', () => {
    expect(renderPrompt('{{a}} {{b}}', { a: 'x' })).toBe('x {{b}}');
  });

  it('inserts values verbatim', () => {
    expect(renderPrompt('{{a}}', { a: '$& {{b}} $1' })).toBe('$& {{b}} $1');
  });
});
