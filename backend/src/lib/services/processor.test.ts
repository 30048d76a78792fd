import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { IngestEnvelope, LogKey, ProcessedLogAttributes } from '@logvault/shared';
import { processEnvelope, processMessage, classifyStoreError } from './processor.js';
import { createRedactor } from './redactor.js';
import { InMemoryLogStore } from './memory.js';
import { DeadlineExceededError, OperationCancelledError } from '../deadline.js';

const envelope: IngestEnvelope = {
  tenant_id: 'tenant-1',
  log_id: 'uuid-1234',
  original_text: 'Customer 555-123-4567 logged in',
  source_format: 'JSON',
  attempt_count: 1,
  enqueued_at: '2024-01-15T10:30:00.000Z',
};

function throttled(): Error {
  const error = new Error('Rate of requests exceeds the allowed throughput');
  error.name = 'ProvisionedThroughputExceededException';
  return error;
}

describe('processor', () => {
  let store: InMemoryLogStore;
  const redactor = createRedactor();
  let tick: number;
  const now = () => new Date(Date.UTC(2024, 0, 15, 11, 0, tick++));

  beforeEach(() => {
    store = new InMemoryLogStore();
    tick = 0;
  });

  it('redacts and persists the entry, then acks', async () => {
    const outcome = await processEnvelope(envelope, { store, redactor, now });

    const expected = {
      tenant_id: 'tenant-1',
      log_id: 'uuid-1234',
      original_text: 'Customer 555-123-4567 logged in',
      modified_text: 'Customer [REDACTED_PHONE] logged in',
      processed_at: '2024-01-15T11:00:00.000Z',
      source_format: 'JSON',
      redacted: true,
    };
    expect(outcome).toEqual({ kind: 'ack', state: 'PERSISTED', entry: expected });
    expect(await store.get({ tenant_id: 'tenant-1', log_id: 'uuid-1234' })).toEqual(expected);
  });

  it('leaves no phone-like digit run in the stored text', async () => {
    await processEnvelope(envelope, { store, redactor, now });
    const entry = await store.get({ tenant_id: 'tenant-1', log_id: 'uuid-1234' });
    expect(entry?.modified_text).not.toMatch(/\d{3}[-. ]?\d{3}[-. ]?\d{4}/);
    expect(new Date(entry?.processed_at ?? '').toISOString()).toBe(entry?.processed_at);
  });

  it('stores unmodified text with redacted=false', async () => {
    const outcome = await processEnvelope({ ...envelope, original_text: '' }, { store, redactor, now });
    expect(outcome).toMatchObject({ kind: 'ack', entry: { modified_text: '', redacted: false } });
  });

  it('writes one entry with identical text when processed twice', async () => {
    const first = await processEnvelope(envelope, { store, redactor, now });
    const second = await processEnvelope(envelope, { store, redactor, now });

    expect(store.size).toBe(1);
    expect(first.kind === 'ack' && first.entry.modified_text).toBe('Customer [REDACTED_PHONE] logged in');
    expect(second.kind === 'ack' && second.entry.modified_text).toBe('Customer [REDACTED_PHONE] logged in');
    // Only the write timestamp moves
    expect((await store.get(envelope))?.processed_at).toBe('2024-01-15T11:00:01.000Z');
  });

  it('keeps same-tenant and same-log-id envelopes apart', async () => {
    await processEnvelope(envelope, { store, redactor, now });
    await processEnvelope({ ...envelope, log_id: 'uuid-5678' }, { store, redactor, now });
    await processEnvelope({ ...envelope, tenant_id: 'tenant-2', original_text: 'other' }, { store, redactor, now });

    expect(store.size).toBe(3);
    expect((await store.get({ tenant_id: 'tenant-2', log_id: 'uuid-1234' }))?.original_text).toBe('other');
    expect((await store.get({ tenant_id: 'tenant-1', log_id: 'uuid-1234' }))?.original_text).toBe(
      'Customer 555-123-4567 logged in'
    );
  });

  describe('malformed envelopes', () => {
    it('nacks a missing tenant as non-retriable without touching the store', async () => {
      const put = vi.spyOn(store, 'put');
      const { tenant_id: _omit, ...withoutTenant } = envelope;

      const outcome = await processEnvelope(withoutTenant, { store, redactor, now });

      expect(outcome).toEqual({
        kind: 'nack',
        state: 'FAILED',
        failureKind: 'NON_RETRIABLE',
        reason: 'Envelope failed validation',
      });
      expect(put).not.toHaveBeenCalled();
    });

    it('nacks an empty log id as non-retriable', async () => {
      const outcome = await processEnvelope({ ...envelope, log_id: '' }, { store, redactor, now });
      expect(outcome).toMatchObject({ kind: 'nack', failureKind: 'NON_RETRIABLE' });
    });

    it('nacks an undecodable body as non-retriable', async () => {
      const outcome = await processMessage('{not json', { store, redactor, now });
      expect(outcome).toEqual({
        kind: 'nack',
        state: 'FAILED',
        failureKind: 'NON_RETRIABLE',
        reason: 'MalformedEnvelopeError: Message body is not valid JSON',
      });
    });
  });

  it('nacks a throwing matcher check as non-retriable without writing', async () => {
    const strict = createRedactor([
      {
        name: 'account',
        pattern: /acct-\d+/g,
        mask: '[REDACTED_ACCOUNT]',
        validate: () => {
          throw new Error('checksum table missing');
        },
      },
    ]);
    const put = vi.spyOn(store, 'put');

    const outcome = await processEnvelope(
      { ...envelope, original_text: 'moved acct-42' },
      { store, redactor: strict, now }
    );

    expect(outcome).toEqual({
      kind: 'nack',
      state: 'FAILED',
      failureKind: 'NON_RETRIABLE',
      reason: 'Error: checksum table missing',
      envelope: { ...envelope, original_text: 'moved acct-42' },
    });
    expect(put).not.toHaveBeenCalled();
  });

  describe('store failures', () => {
    it('nacks a throttled write as retriable and carries the envelope', async () => {
      vi.spyOn(store, 'put').mockRejectedValueOnce(throttled());

      const outcome = await processEnvelope(envelope, { store, redactor, now });

      expect(outcome).toEqual({
        kind: 'nack',
        state: 'FAILED',
        failureKind: 'RETRIABLE',
        reason: 'ProvisionedThroughputExceededException: Rate of requests exceeds the allowed throughput',
        envelope,
      });
      expect(store.size).toBe(0);
    });

    it('nacks a write that outlives its timeout as retriable', async () => {
      vi.spyOn(store, 'put').mockImplementationOnce(() => new Promise<void>(() => undefined));

      const outcome = await processEnvelope(envelope, { store, redactor, now, storeTimeoutMs: 5 });

      expect(outcome).toMatchObject({ kind: 'nack', failureKind: 'RETRIABLE' });
    });

    it('nacks as retriable when the invocation is cancelled', async () => {
      const controller = new AbortController();
      controller.abort();
      const put = vi.spyOn(store, 'put');

      const outcome = await processEnvelope(envelope, { store, redactor, now, signal: controller.signal });

      expect(outcome).toMatchObject({ kind: 'nack', failureKind: 'RETRIABLE' });
      expect(put).not.toHaveBeenCalled();
      expect(store.size).toBe(0);
    });

    it('succeeds on the retry after a transient failure, leaving one entry', async () => {
      vi.spyOn(store, 'put').mockRejectedValueOnce(throttled());

      const first = await processEnvelope(envelope, { store, redactor, now });
      const second = await processEnvelope({ ...envelope, attempt_count: 2 }, { store, redactor, now });

      expect(first.kind).toBe('nack');
      expect(second.kind).toBe('ack');
      expect(store.size).toBe(1);
    });
  });

  it('writes under the composite key with an abortable signal', async () => {
    const put = vi.fn(async (_key: LogKey, _attributes: ProcessedLogAttributes) => undefined);
    const outcome = await processMessage(
      JSON.stringify(envelope),
      { store: { put, get: vi.fn(), list: vi.fn() }, redactor, now },
      3
    );

    expect(outcome.kind).toBe('ack');
    expect(put).toHaveBeenCalledWith(
      { tenant_id: 'tenant-1', log_id: 'uuid-1234' },
      expect.objectContaining({ modified_text: 'Customer [REDACTED_PHONE] logged in' }),
      { signal: expect.any(AbortSignal) }
    );
  });

  describe('classifyStoreError', () => {
    it('treats timeouts, cancellation and throttling as retriable', () => {
      expect(classifyStoreError(new DeadlineExceededError(10))).toBe('RETRIABLE');
      expect(classifyStoreError(new OperationCancelledError())).toBe('RETRIABLE');
      expect(classifyStoreError(throttled())).toBe('RETRIABLE');
      expect(classifyStoreError('socket hang up')).toBe('RETRIABLE');
    });

    it('treats store validation rejections as non-retriable', () => {
      const error = new Error('Item size has exceeded the maximum allowed size');
      error.name = 'ValidationException';
      expect(classifyStoreError(error)).toBe('NON_RETRIABLE');
    });
  });
});
