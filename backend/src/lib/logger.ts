import { pino } from 'pino';

// Create logger instance with Lambda-friendly settings
export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  // Lambda already adds timestamp
  timestamp: false,
  // Structured logging for CloudWatch
  formatters: {
    level: (label) => ({ level: label }),
  },
  // Raw log payloads are tenant data and may hold the very values the redactor strips
  redact: {
    paths: [
      'authorization',
      'Authorization',
      'headers.authorization',
      'headers["x-api-key"]',
      'body',
      'text',
      'original_text',
      'envelope.original_text',
      'raw_body',
    ],
    censor: '[REDACTED]',
  },
});

// Create child logger with request context
export function createRequestLogger(requestId: string, tenantId?: string) {
  return logger.child({
    requestId,
    ...(tenantId && { tenantId }),
  });
}

export type Logger = typeof logger;
