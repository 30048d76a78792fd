import type { FailureKind, SourceFormat } from './enums.js';

// Normalizer output; plaintext uploads carry no log_id until an envelope is built
export interface NormalizedLog {
  tenant_id: string;
  log_id?: string;
  original_text: string;
  source_format: SourceFormat;
}

// Canonical record, both identifiers present
export interface LogRecord extends NormalizedLog {
  log_id: string;
}

// Queue wire format between the ingest and worker functions
export interface IngestEnvelope extends LogRecord {
  attempt_count: number;
  enqueued_at: string; // ISO-8601 UTC
}

// Composite key of a persisted entry. Every store operation takes one.
export interface LogKey {
  tenant_id: string; // partition key
  log_id: string; // sort key
}

export interface ProcessedLogAttributes {
  original_text: string;
  modified_text: string;
  processed_at: string; // ISO-8601 UTC, set at write time
  source_format: SourceFormat;
  redacted: boolean;
}

export type ProcessedLogEntry = LogKey & ProcessedLogAttributes;

// Published to the dead-letter queue for manual inspection
export interface DeadLetterMessage {
  envelope?: IngestEnvelope;
  raw_body?: string; // only when the body could not be decoded
  attempt_count: number;
  failure_reason: string;
  failure_kind: FailureKind;
  dead_lettered_at: string;
}
