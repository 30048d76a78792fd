// Comma-separated env list, empty entries dropped
function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// Environment configuration
export const config = {
  // AWS Region
  region: process.env.AWS_REGION || 'us-east-1',

  // DynamoDB Tables
  tables: {
    processedLogs: process.env.TABLE_NAME || 'tenant_processed_logs',
  },

  // SQS Queues
  queues: {
    ingest: process.env.QUEUE_URL || '',
    deadLetter: process.env.DLQ_URL || '',
    // SQS limit on one message body
    maxMessageBytes: 256 * 1024,
  },

  // Worker settings
  processing: {
    maxAttempts: Number(process.env.MAX_RECEIVE_COUNT) || 5,
    storeTimeoutMs: Number(process.env.STORE_TIMEOUT_MS) || 3000,
    queueTimeoutMs: Number(process.env.QUEUE_TIMEOUT_MS) || 3000,
    // Stop work this long before the Lambda deadline so unacked records stay pending
    cancellationMarginMs: Number(process.env.CANCELLATION_MARGIN_MS) || 1000,
  },

  // Redaction matcher names in priority order; empty means the built-in set
  redaction: {
    matchers: parseList(process.env.REDACTION_MATCHERS),
  },

  // API settings
  api: {
    defaultPageSize: 20,
    maxPageSize: 100,
    // Stored items hold the text twice and DynamoDB caps an item at 400 KB
    maxBodyBytes: Number(process.env.MAX_BODY_BYTES) || 190 * 1024,
  },

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;
