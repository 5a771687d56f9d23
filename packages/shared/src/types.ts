/**
 * Shared TypeScript Types
 *
 * Types for the Statement of Facts extraction pipeline, matching
 * docs/contracts/sof_record.schema.json
 */

// ============================================================================
// Statement of Facts Record
// ============================================================================

/** Per-field certainty reported by the model, within [0, 1]. */
export type Confidence = number | null;

export interface PartyDetails {
  shipowner_name?: string | null;
  charterer_name?: string | null;
  port_agent_name?: string | null;
  confidence?: Confidence;
}

export interface CargoDetails {
  operation_type?: string | null;
  cargo_type?: string | null;
  quantity?: number | null;
  unit?: string | null;
  confidence?: Confidence;
}

export interface DocumentDetails {
  document_source?: string | null;
  date_of_document?: string | null;
  port_name?: string | null;
  vessel_name?: string | null;
  voyage_number?: string | null;
  parties?: PartyDetails | null;
  cargo?: CargoDetails | null;
  confidence?: Confidence;
}

/**
 * A chronological entry of the statement (arrival, NOR tendered, loading, rain stoppage...).
 * Instantaneous events carry the same start and end timestamp.
 */
export interface SofEvent {
  event_id?: number | null;
  event_type?: string | null;
  start_date?: string | null;
  start_time?: string | null;
  end_date?: string | null;
  end_time?: string | null;
  duration_hours?: number | null;
  weather_conditions?: string | null;
  remarks?: string | null;
  confidence?: Confidence;
}

export interface LaytimeNotes {
  free_time_periods_identified?: string | null;
  suspension_periods_identified?: string | null;
  remarks_on_interruptions_or_delays?: string | null;
  confidence?: Confidence;
}

export interface Signatory {
  role?: string | null;
  name?: string | null;
  date_signed?: string | null;
  confidence?: Confidence;
}

export interface SoFRecord {
  document_details: DocumentDetails;
  events: SofEvent[];
  laytime_notes: LaytimeNotes;
  approvals?: Signatory[] | null;
}

/**
 * Final record handed to the caller, with the document identifier attached
 * by the worker (never by the pipeline).
 */
export interface SofExtractionOutput extends SoFRecord {
  fileName: string;
}

// ============================================================================
// Errors
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
