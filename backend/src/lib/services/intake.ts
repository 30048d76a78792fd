import { ErrorCode, RejectionKind, type IngestEnvelope } from '@logvault/shared';
import { config } from '../config.js';
import { withDeadline } from '../deadline.js';
import { AppError, PayloadTooLargeError, QueueUnavailableError, describeError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { QueueChannel } from '../sqs.js';
import { buildEnvelope, type EnvelopeOptions } from './envelope.js';
import { getHeader, normalize, type RequestHeaders } from './normalizer.js';

export interface IngestRequest {
  headers: RequestHeaders;
  body?: string;
}

export type IntakeResult =
  | { status: 'accepted'; envelope: IngestEnvelope }
  | { status: 'rejected'; kind: RejectionKind; error: AppError };

export interface IntakeDeps extends EnvelopeOptions {
  queue: QueueChannel;
  logger?: Logger;
  signal?: AbortSignal;
  queueTimeoutMs?: number;
  maxBodyBytes?: number;
  maxMessageBytes?: number;
}

function reject(kind: RejectionKind, error: AppError): IntakeResult {
  return { status: 'rejected', kind, error };
}

/**
 * Validate a request and hand it to the queue.
 *
 * Accepted means durably queued, not processed. A rejection is either the
 * caller's fault (fix and resubmit) or an internal fault (resubmit as is);
 * nothing is retried here. Exactly one submission per accepted request.
 */
export async function acceptRequest(request: IngestRequest, deps: IntakeDeps): Promise<IntakeResult> {
  const log = deps.logger ?? rootLogger;
  const maxBodyBytes = deps.maxBodyBytes ?? config.api.maxBodyBytes;
  const maxMessageBytes = deps.maxMessageBytes ?? config.queues.maxMessageBytes;

  let envelope: IngestEnvelope;
  try {
    if (Buffer.byteLength(request.body ?? '', 'utf8') > maxBodyBytes) {
      throw new PayloadTooLargeError(maxBodyBytes);
    }
    const record = normalize(getHeader(request.headers, 'content-type'), request.headers, request.body);
    envelope = buildEnvelope(record, deps);
    // JSON escaping can grow the text well past the raw body size
    if (Buffer.byteLength(JSON.stringify(envelope), 'utf8') > maxMessageBytes) {
      throw new PayloadTooLargeError(maxMessageBytes, 'Queued log');
    }
  } catch (error) {
    if (error instanceof AppError && error.isClientError) {
      log.info({ code: error.code, reason: error.message }, 'Ingest request rejected');
      return reject(RejectionKind.CLIENT_ERROR, error);
    }
    log.error({ reason: describeError(error) }, 'Unexpected intake failure');
    return reject(
      RejectionKind.INTERNAL_FAULT,
      new AppError(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', 500)
    );
  }

  try {
    await withDeadline(
      deps.queueTimeoutMs ?? config.processing.queueTimeoutMs,
      (signal) => deps.queue.submit(envelope, { signal }),
      deps.signal
    );
  } catch (error) {
    const reason = describeError(error);
    log.error({ tenantId: envelope.tenant_id, logId: envelope.log_id, reason }, 'Queue submission failed');
    return reject(RejectionKind.INTERNAL_FAULT, new QueueUnavailableError(reason));
  }

  log.info(
    { tenantId: envelope.tenant_id, logId: envelope.log_id, sourceFormat: envelope.source_format },
    'Log queued'
  );
  return { status: 'accepted', envelope };
}
