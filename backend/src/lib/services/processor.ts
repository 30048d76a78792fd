import {
  FailureKind,
  ProcessingState,
  type IngestEnvelope,
  type ProcessedLogEntry,
} from '@logvault/shared';
import { config } from '../config.js';
import { withDeadline, DeadlineExceededError, OperationCancelledError } from '../deadline.js';
import { AppError, InvalidStateTransitionError, describeError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import { decodeEnvelope, validateEnvelope, type Clock } from './envelope.js';
import type { ProcessedLogStore } from './logs.js';
import type { RedactionResult, Redactor } from './redactor.js';

// Valid state transitions
const VALID_TRANSITIONS: Record<ProcessingState, ProcessingState[]> = {
  RECEIVED: ['REDACTED', 'FAILED'],
  REDACTED: ['PERSISTED', 'FAILED'],
  PERSISTED: [],
  FAILED: [],
};

function canTransition(from: ProcessingState, to: ProcessingState): boolean {
  return VALID_TRANSITIONS[from]?.includes(to) ?? false;
}

export type ProcessOutcome =
  | { kind: 'ack'; state: 'PERSISTED'; entry: ProcessedLogEntry }
  | {
      kind: 'nack';
      state: 'FAILED';
      failureKind: FailureKind;
      reason: string;
      // Set once the envelope decoded, so a dead letter can carry it
      envelope?: IngestEnvelope;
    };

export interface ProcessorDeps {
  store: ProcessedLogStore;
  redactor: Redactor;
  now?: Clock;
  logger?: Logger;
  // Aborts when the surrounding invocation runs out of time
  signal?: AbortSignal;
  storeTimeoutMs?: number;
}

// Stores reject some writes outright; repeating them cannot succeed
const NON_RETRIABLE_STORE_ERRORS = new Set(['ValidationException']);

export function classifyStoreError(error: unknown): FailureKind {
  if (error instanceof DeadlineExceededError || error instanceof OperationCancelledError) {
    return FailureKind.RETRIABLE;
  }
  if (error instanceof Error && NON_RETRIABLE_STORE_ERRORS.has(error.name)) {
    return FailureKind.NON_RETRIABLE;
  }
  return FailureKind.RETRIABLE;
}

class EnvelopeRun {
  state: ProcessingState = ProcessingState.RECEIVED;

  constructor(private readonly log: Logger) {}

  moveTo(next: ProcessingState): void {
    if (!canTransition(this.state, next)) {
      throw new InvalidStateTransitionError(this.state, next);
    }
    this.log.debug({ from: this.state, to: next }, 'Envelope state changed');
    this.state = next;
  }
}

/**
 * Redact one envelope and upsert it under (tenant_id, log_id).
 *
 * Never throws. Failures come back as a nack whose failure kind tells the
 * channel whether redelivery can help. Running the same envelope again
 * rewrites the same entry with the same `modified_text`.
 */
export async function processEnvelope(input: unknown, deps: ProcessorDeps): Promise<ProcessOutcome> {
  const now = deps.now ?? (() => new Date());
  const log = deps.logger ?? rootLogger;
  const run = new EnvelopeRun(log);

  let envelope: IngestEnvelope;
  try {
    envelope = validateEnvelope(input);
  } catch (error) {
    run.moveTo(ProcessingState.FAILED);
    const reason = error instanceof AppError ? error.message : describeError(error);
    log.error({ reason, details: error instanceof AppError ? error.details : undefined }, 'Malformed envelope');
    return { kind: 'nack', state: 'FAILED', failureKind: FailureKind.NON_RETRIABLE, reason };
  }

  const envelopeLog = log.child({ tenantId: envelope.tenant_id, logId: envelope.log_id });
  let redaction: RedactionResult;
  try {
    redaction = deps.redactor(envelope.original_text);
  } catch (error) {
    // The same text fails the same way on every redelivery
    run.moveTo(ProcessingState.FAILED);
    const reason = describeError(error);
    envelopeLog.error({ reason }, 'Redaction failed');
    return { kind: 'nack', state: 'FAILED', failureKind: FailureKind.NON_RETRIABLE, reason, envelope };
  }
  const { modifiedText, wasModified } = redaction;
  run.moveTo(ProcessingState.REDACTED);

  const entry: ProcessedLogEntry = {
    tenant_id: envelope.tenant_id,
    log_id: envelope.log_id,
    original_text: envelope.original_text,
    modified_text: modifiedText,
    processed_at: now().toISOString(),
    source_format: envelope.source_format,
    redacted: wasModified,
  };

  try {
    await withDeadline(
      deps.storeTimeoutMs ?? config.processing.storeTimeoutMs,
      (signal) =>
        deps.store.put(
          { tenant_id: entry.tenant_id, log_id: entry.log_id },
          {
            original_text: entry.original_text,
            modified_text: entry.modified_text,
            processed_at: entry.processed_at,
            source_format: entry.source_format,
            redacted: entry.redacted,
          },
          { signal }
        ),
      deps.signal
    );
  } catch (error) {
    run.moveTo(ProcessingState.FAILED);
    const failureKind = classifyStoreError(error);
    const reason = describeError(error);
    envelopeLog.warn({ failureKind, reason, attempt: envelope.attempt_count }, 'Store write failed');
    return { kind: 'nack', state: 'FAILED', failureKind, reason, envelope };
  }

  run.moveTo(ProcessingState.PERSISTED);
  envelopeLog.info({ redacted: wasModified, attempt: envelope.attempt_count }, 'Processed log');
  return { kind: 'ack', state: 'PERSISTED', entry };
}

// Deserialize an opaque queue body and process it
export async function processMessage(
  raw: string,
  deps: ProcessorDeps,
  attemptCount?: number
): Promise<ProcessOutcome> {
  let envelope: IngestEnvelope;
  try {
    envelope = decodeEnvelope(raw);
  } catch (error) {
    const reason = describeError(error);
    (deps.logger ?? rootLogger).error({ reason }, 'Undecodable queue message');
    return { kind: 'nack', state: 'FAILED', failureKind: FailureKind.NON_RETRIABLE, reason };
  }

  return processEnvelope(
    attemptCount === undefined ? envelope : { ...envelope, attempt_count: attemptCount },
    deps
  );
}
