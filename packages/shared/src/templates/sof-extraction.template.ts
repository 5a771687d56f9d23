/**
 * Statement of Facts Extraction Template
 *
 * Document semantics:
 * - One SOF per document: vessel, port, voyage, parties and cargo in the header
 * - A chronological log of port events (arrival, NOR tendered, berthing, loading, stoppages)
 * - Laytime remarks and signatures from master, agent and terminal at the foot
 */

import type { PromptTemplate } from './types';

export const SOF_EXTRACTION_TEMPLATE: PromptTemplate = {
  stage: 'extraction',
  description: 'Maritime Statement of Facts - extracts document details, events, laytime notes and approvals',

  systemPrompt: `You are a document extraction specialist for maritime Statement of Facts (SOF) documents.
You are given a Statement of Facts document. Extract its details into the provided schema (SoFSchema).

GUIDELINES:
1. If information is clearly present in the document, do not leave fields blank.
2. For every recorded event, ensure both start_time and end_time are populated. If an event represents a single point in time, use that same timestamp for both the start and end.
3. If distinct start and end times are given, calculate the duration_hours.
4. Include all relevant notes on weather, delays, tug usage, approvals, and laytime.
5. Only leave a field as null if the data is truly missing from the document.
6. Add a confidence score (from 0.0 to 1.0) for each extracted value.

EVENTS:
- List events in the chronological order they appear in the document
- Number event_id from 1 in that order
- Keep dates and times as written in the document (e.g. "14 Mar 2024", "08:00")

Never invent values. A vessel, port, party or quantity that the text does not state is null.`,

  userPromptTemplate: `Extract the Statement of Facts below into the SoFSchema.

--- DOCUMENT TEXT ---
{{document_text}}
--- END DOCUMENT ---

Return a single JSON object with document_details, events, laytime_notes and approvals.`,
};
