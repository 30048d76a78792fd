import { ErrorCode, type ApiError } from '@logvault/shared';

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  // 4xx errors are the caller's to fix; retrying the same request will not help
  get isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  toApiError(requestId: string): ApiError {
    return {
      error: {
        code: this.code,
        message: this.message,
        requestId,
        ...(this.details && { details: this.details }),
      },
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(ErrorCode.NOT_FOUND, `${resource} not found: ${id}`, 404);
    this.name = 'NotFoundError';
  }
}

// Base for everything the normalizer rejects
export class NormalizationError extends AppError {
  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, 400, details);
    this.name = 'NormalizationError';
  }
}

export class MissingFieldError extends NormalizationError {
  constructor(public readonly field: string) {
    super(ErrorCode.MISSING_FIELD, `Missing required field: ${field}`, { field });
    this.name = 'MissingFieldError';
  }
}

export class MissingTenantError extends NormalizationError {
  constructor(header: string) {
    super(ErrorCode.MISSING_TENANT, `Missing tenant header: ${header}`, { header });
    this.name = 'MissingTenantError';
  }
}

export class MalformedBodyError extends NormalizationError {
  constructor(message = 'Request body is not a valid JSON object') {
    super(ErrorCode.MALFORMED_BODY, message);
    this.name = 'MalformedBodyError';
  }
}

export class TenantMismatchError extends NormalizationError {
  constructor() {
    super(ErrorCode.TENANT_MISMATCH, 'Tenant header does not match tenant_id in body');
    this.name = 'TenantMismatchError';
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(maxBytes: number, subject = 'Request body') {
    super(
      ErrorCode.PAYLOAD_TOO_LARGE,
      `${subject} exceeds maximum size of ${maxBytes} bytes`,
      413
    );
    this.name = 'PayloadTooLargeError';
  }
}

export class QueueUnavailableError extends AppError {
  constructor(reason: string) {
    super(ErrorCode.QUEUE_UNAVAILABLE, 'Log could not be queued for processing', 503, {
      reason,
    });
    this.name = 'QueueUnavailableError';
  }
}

export class StoreUnavailableError extends AppError {
  constructor(reason: string) {
    super(ErrorCode.STORE_UNAVAILABLE, 'Log store is unavailable', 503, { reason });
    this.name = 'StoreUnavailableError';
  }
}

export class MalformedEnvelopeError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.MALFORMED_ENVELOPE, message, 500, details);
    this.name = 'MalformedEnvelopeError';
  }
}

export class InvalidStateTransitionError extends AppError {
  constructor(from: string, to: string) {
    super(
      ErrorCode.INVALID_STATE_TRANSITION,
      `Invalid state transition from ${from} to ${to}`,
      500
    );
    this.name = 'InvalidStateTransitionError';
  }
}

// Message of an unknown thrown value, for logs and failure reasons
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
