// Common API types

// Standard error response
export interface ApiError {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: Record<string, unknown>;
  };
}

// Error codes
export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  MISSING_FIELD: 'MISSING_FIELD',
  MISSING_TENANT: 'MISSING_TENANT',
  MALFORMED_BODY: 'MALFORMED_BODY',
  TENANT_MISMATCH: 'TENANT_MISMATCH',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',
  QUEUE_UNAVAILABLE: 'QUEUE_UNAVAILABLE',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  MALFORMED_ENVELOPE: 'MALFORMED_ENVELOPE',
  INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// Paginated response wrapper
export interface PaginatedResponse<T> {
  items: T[];
  cursor?: string;
  hasMore: boolean;
}

// Query parameters for list endpoints
export interface PaginationParams {
  limit?: number;
  cursor?: string;
}

// Body of a 202 from POST /ingest
export interface IngestAcceptedResponse {
  status: 'accepted';
  tenant_id: string;
  log_id: string;
}

// Health check response
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
}
