/**
 * Test Helpers
 *
 * In-process LLM stand-in and record factories.
 */

import type {
  LlmClient,
  LlmCompletion,
  LlmCompletionRequest,
  SoFRecord,
  SofEvent,
} from '@sof-extract/shared';

export const SAMPLE_SOF_TEXT = `STATEMENT OF FACTS
Vessel: MV TEST CARRIER    Voyage: 12A
Port: Exampleport
Owners: Example Shipping Ltd    Charterers: Sample Trading Co
Cargo: 25,000 MT Wheat in bulk (loading)

14 Mar  08:00  Loading commenced
14 Mar  14:00  Loading completed
15 Mar  09:30  NOR tendered

Master: J. Placeholder`;

export function makeEvent(overrides: Partial<SofEvent> = {}): SofEvent {
  return {
    event_id: 1,
    event_type: 'Loading',
    start_date: '14 Mar',
    start_time: '08:00',
    end_date: '14 Mar',
    end_time: '14:00',
    duration_hours: null,
    weather_conditions: null,
    remarks: null,
    confidence: 0.95,
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<SoFRecord> = {}): SoFRecord {
  return {
    document_details: {
      document_source: null,
      date_of_document: null,
      port_name: 'Exampleport',
      vessel_name: 'MV TEST CARRIER',
      voyage_number: '12A',
      parties: {
        shipowner_name: 'Example Shipping Ltd',
        charterer_name: 'Sample Trading Co',
        port_agent_name: null,
        confidence: 0.9,
      },
      cargo: {
        operation_type: 'loading',
        cargo_type: 'Wheat in bulk',
        quantity: 25000,
        unit: 'MT',
        confidence: 0.9,
      },
      confidence: 0.95,
    },
    events: [makeEvent()],
    laytime_notes: {
      free_time_periods_identified: null,
      suspension_periods_identified: null,
      remarks_on_interruptions_or_delays: null,
      confidence: 0.5,
    },
    approvals: [{ role: 'Master', name: 'J. Placeholder', date_signed: null, confidence: 0.9 }],
    ...overrides,
  };
}

/** Completion whose structured payload and raw text both carry the record */
export function completionOf(payload: unknown, requestId: string = 'req_test'): LlmCompletion {
  return {
    structured: payload,
    text: JSON.stringify(payload),
    model: 'gpt-test',
    requestId,
  };
}

type Responder = (request: LlmCompletionRequest) => LlmCompletion | Promise<LlmCompletion>;

/**
 * LLM client that answers from a responder and records every request.
 */
export class FakeLlmClient implements LlmClient {
  readonly requests: LlmCompletionRequest[] = [];

  constructor(private readonly responder: Responder) {}

  async complete(request: LlmCompletionRequest): Promise<LlmCompletion> {
    this.requests.push(request);
    return this.responder(request);
  }

  requestsFor(stage: LlmCompletionRequest['stage']): LlmCompletionRequest[] {
    return this.requests.filter((r) => r.stage === stage);
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Resolve after `ms`, or reject as soon as the signal aborts.
 */
export function abortableDelay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('aborted'));
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('aborted'));
      },
      { once: true }
    );
  });
}
