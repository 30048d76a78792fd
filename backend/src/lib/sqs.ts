import { SQSClient, SendMessageCommand } from '@aws-sdk/client-sqs';
import type { DeadLetterMessage, IngestEnvelope } from '@logvault/shared';
import { config } from './config.js';

// Create SQS client
export const sqsClient = new SQSClient({ region: config.region });

export interface SendOptions {
  signal?: AbortSignal;
}

// Ingest side of the queue channel
export interface QueueChannel {
  submit(envelope: IngestEnvelope, options?: SendOptions): Promise<void>;
}

// Terminal side channel for messages that will not be processed
export interface DeadLetterChannel {
  deadLetter(message: DeadLetterMessage, options?: SendOptions): Promise<void>;
}

export class SqsQueueChannel implements QueueChannel, DeadLetterChannel {
  constructor(
    private readonly queueUrl: string = config.queues.ingest,
    private readonly deadLetterUrl: string = config.queues.deadLetter,
    private readonly client: SQSClient = sqsClient
  ) {}

  async submit(envelope: IngestEnvelope, options?: SendOptions): Promise<void> {
    await this.send(this.queueUrl, JSON.stringify(envelope), envelope.tenant_id, options);
  }

  async deadLetter(message: DeadLetterMessage, options?: SendOptions): Promise<void> {
    await this.send(
      this.deadLetterUrl,
      JSON.stringify(message),
      message.envelope?.tenant_id,
      options
    );
  }

  private async send(
    queueUrl: string,
    body: string,
    tenantId: string | undefined,
    options?: SendOptions
  ): Promise<void> {
    if (!queueUrl) {
      throw new Error('Queue URL is not configured');
    }
    await this.client.send(
      new SendMessageCommand({
        QueueUrl: queueUrl,
        MessageBody: body,
        ...(tenantId && {
          MessageAttributes: {
            tenant_id: { DataType: 'String', StringValue: tenantId },
          },
        }),
      }),
      { abortSignal: options?.signal }
    );
  }
}
