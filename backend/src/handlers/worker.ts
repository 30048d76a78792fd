import type { Context, SQSBatchResponse, SQSEvent, SQSRecord } from 'aws-lambda';
import { config } from '../lib/config.js';
import { describeError } from '../lib/errors.js';
import { createRequestLogger } from '../lib/logger.js';
import { SqsQueueChannel, type DeadLetterChannel } from '../lib/sqs.js';
import { handleDelivery, type DeliveryDecision } from '../lib/services/delivery.js';
import { dynamoLogStore, type ProcessedLogStore } from '../lib/services/logs.js';
import { getConfiguredRedactor, type Redactor } from '../lib/services/redactor.js';

export interface WorkerDeps {
  store: ProcessedLogStore;
  deadLetters: DeadLetterChannel;
  redactor: Redactor;
}

/**
 * SQS consumer. Records of a batch run concurrently and only the ones left
 * for redelivery are reported back, which needs ReportBatchItemFailures on
 * the event source mapping.
 */
export function createWorkerHandler(deps: WorkerDeps) {
  return async function handler(event: SQSEvent, context: Context): Promise<SQSBatchResponse> {
    const logger = createRequestLogger(context.awsRequestId);

    // Abort in-flight writes before Lambda kills the invocation so unacked records stay pending
    const controller = new AbortController();
    const budgetMs = context.getRemainingTimeInMillis() - config.processing.cancellationMarginMs;
    const timer = setTimeout(() => controller.abort(), Math.max(budgetMs, 0));
    if (budgetMs <= 0) {
      controller.abort();
    }

    const handleRecord = async (record: SQSRecord): Promise<DeliveryDecision> => {
      try {
        return await handleDelivery(
          {
            messageId: record.messageId,
            body: record.body,
            receiveCount: Number(record.attributes.ApproximateReceiveCount) || 1,
          },
          { ...deps, logger, signal: controller.signal }
        );
      } catch (error) {
        logger.error({ messageId: record.messageId, error: describeError(error) }, 'Record handling failed');
        return 'retry';
      }
    };

    try {
      const decisions = await Promise.all(event.Records.map(handleRecord));
      const batchItemFailures = event.Records.filter((_, index) => decisions[index] === 'retry').map(
        (record) => ({ itemIdentifier: record.messageId })
      );

      logger.info(
        { records: event.Records.length, failures: batchItemFailures.length },
        'Batch processed'
      );
      return { batchItemFailures };
    } finally {
      clearTimeout(timer);
    }
  };
}

// Main handler
export const handler = createWorkerHandler({
  store: dynamoLogStore,
  deadLetters: new SqsQueueChannel(),
  redactor: getConfiguredRedactor(),
});
