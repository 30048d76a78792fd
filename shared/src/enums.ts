// Format the log arrived in
export const SourceFormat = {
  JSON: 'JSON',
  PLAINTEXT: 'PLAINTEXT',
} as const;
export type SourceFormat = (typeof SourceFormat)[keyof typeof SourceFormat];

// Why an ingest request was turned away
export const RejectionKind = {
  CLIENT_ERROR: 'CLIENT_ERROR',
  INTERNAL_FAULT: 'INTERNAL_FAULT',
} as const;
export type RejectionKind = (typeof RejectionKind)[keyof typeof RejectionKind];

// Whether a failed delivery is worth redelivering
export const FailureKind = {
  RETRIABLE: 'RETRIABLE',
  NON_RETRIABLE: 'NON_RETRIABLE',
} as const;
export type FailureKind = (typeof FailureKind)[keyof typeof FailureKind];

// Per-envelope processing lifecycle
export const ProcessingState = {
  RECEIVED: 'RECEIVED',
  REDACTED: 'REDACTED',
  PERSISTED: 'PERSISTED',
  FAILED: 'FAILED',
} as const;
export type ProcessingState = (typeof ProcessingState)[keyof typeof ProcessingState];
