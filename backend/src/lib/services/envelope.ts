import { ulid } from 'ulid';
import type { IngestEnvelope, NormalizedLog } from '@logvault/shared';
import { MalformedEnvelopeError } from '../errors.js';
import { ingestEnvelopeSchema } from '../validation.js';

export type IdGenerator = () => string;
export type Clock = () => Date;

export interface EnvelopeOptions {
  generateId?: IdGenerator;
  now?: Clock;
}

// The only place log ids are synthesized
export function buildEnvelope(record: NormalizedLog, options: EnvelopeOptions = {}): IngestEnvelope {
  const generateId = options.generateId ?? ulid;
  const now = options.now ?? (() => new Date());

  return {
    tenant_id: record.tenant_id,
    log_id: record.log_id ?? generateId(),
    original_text: record.original_text,
    source_format: record.source_format,
    attempt_count: 0,
    enqueued_at: now().toISOString(),
  };
}

export function validateEnvelope(input: unknown): IngestEnvelope {
  const result = ingestEnvelopeSchema.safeParse(input);
  if (!result.success) {
    throw new MalformedEnvelopeError('Envelope failed validation', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}

// Queue bodies are opaque bytes until they decode to a valid envelope
export function decodeEnvelope(raw: string): IngestEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedEnvelopeError('Message body is not valid JSON');
  }
  return validateEnvelope(parsed);
}
