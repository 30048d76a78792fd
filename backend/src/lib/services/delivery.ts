import { FailureKind, type DeadLetterMessage } from '@logvault/shared';
import { config } from '../config.js';
import { withDeadline } from '../deadline.js';
import { describeError } from '../errors.js';
import { logger as rootLogger } from '../logger.js';
import type { DeadLetterChannel } from '../sqs.js';
import { processMessage, type ProcessorDeps, type ProcessOutcome } from './processor.js';

// One delivery of a queue message; receiveCount starts at 1
export interface Delivery {
  messageId: string;
  body: string;
  receiveCount: number;
}

export type DeliveryDecision = 'ack' | 'retry';

export interface DeliveryDeps extends ProcessorDeps {
  deadLetters: DeadLetterChannel;
  maxAttempts?: number;
  queueTimeoutMs?: number;
}

function toDeadLetter(
  delivery: Delivery,
  outcome: Extract<ProcessOutcome, { kind: 'nack' }>,
  now: Date
): DeadLetterMessage {
  return {
    ...(outcome.envelope ? { envelope: outcome.envelope } : { raw_body: delivery.body }),
    attempt_count: delivery.receiveCount,
    failure_reason: outcome.reason,
    failure_kind: outcome.failureKind,
    dead_lettered_at: now.toISOString(),
  };
}

/**
 * Consumer half of the at-least-once contract.
 *
 * `ack` removes the message from the pending set, `retry` leaves it for
 * redelivery. Non-retriable failures and retriable ones on their last
 * allowed attempt are published to the dead-letter channel and then acked;
 * if that publish fails the message stays pending.
 */
export async function handleDelivery(delivery: Delivery, deps: DeliveryDeps): Promise<DeliveryDecision> {
  const log = (deps.logger ?? rootLogger).child({ messageId: delivery.messageId });
  const maxAttempts = deps.maxAttempts ?? config.processing.maxAttempts;

  const outcome = await processMessage(delivery.body, { ...deps, logger: log }, delivery.receiveCount);
  if (outcome.kind === 'ack') {
    return 'ack';
  }

  const exhausted = delivery.receiveCount >= maxAttempts;
  if (outcome.failureKind === FailureKind.RETRIABLE && !exhausted) {
    log.info({ receiveCount: delivery.receiveCount, maxAttempts }, 'Leaving message for redelivery');
    return 'retry';
  }

  const message = toDeadLetter(delivery, outcome, (deps.now ?? (() => new Date()))());
  try {
    await withDeadline(
      deps.queueTimeoutMs ?? config.processing.queueTimeoutMs,
      (signal) => deps.deadLetters.deadLetter(message, { signal }),
      deps.signal
    );
  } catch (error) {
    log.error({ error: describeError(error) }, 'Dead-letter publish failed');
    return 'retry';
  }

  log.warn(
    { failureKind: outcome.failureKind, attempts: delivery.receiveCount, reason: outcome.reason },
    'Message dead-lettered'
  );
  return 'ack';
}
