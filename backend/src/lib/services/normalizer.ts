import type { ZodIssue } from 'zod';
import { SourceFormat, type NormalizedLog } from '@logvault/shared';
import {
  MalformedBodyError,
  MissingFieldError,
  MissingTenantError,
  TenantMismatchError,
  ValidationError,
} from '../errors.js';
import { jsonLogInputSchema, tenantIdSchema } from '../validation.js';

export const TENANT_HEADER = 'x-tenant-id';

export type RequestHeaders = Record<string, string | undefined>;

// Header names are case-insensitive; API Gateway v2 lowercases them but direct invokes may not
export function getHeader(headers: RequestHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && value !== undefined) {
      return value;
    }
  }
  return undefined;
}

// "Application/JSON; charset=utf-8" -> "application/json"
export function mediaType(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

export function isStructuredContentType(contentType: string | undefined): boolean {
  const type = mediaType(contentType);
  return type === 'application/json' || type.endsWith('+json');
}

// A required field that is absent, null or empty counts as missing
function isMissingFieldIssue(issue: ZodIssue): boolean {
  if (issue.code === 'invalid_type') {
    return issue.received === 'undefined' || issue.received === 'null';
  }
  return issue.code === 'too_small' && issue.path[0] === 'tenant_id';
}

function normalizeJson(headers: RequestHeaders, body: string): NormalizedLog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    throw new MalformedBodyError('Invalid JSON in request body');
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MalformedBodyError();
  }

  const result = jsonLogInputSchema.safeParse(parsed);
  if (!result.success) {
    const missing = result.error.issues.find(isMissingFieldIssue);
    if (missing) {
      throw new MissingFieldError(String(missing.path[0]));
    }
    throw new ValidationError('Validation failed', { issues: result.error.issues });
  }

  const input = result.data;
  const headerTenant = getHeader(headers, TENANT_HEADER);
  if (headerTenant !== undefined && headerTenant !== input.tenant_id) {
    throw new TenantMismatchError();
  }

  return {
    tenant_id: input.tenant_id,
    ...(input.log_id !== undefined && { log_id: input.log_id }),
    original_text: input.text,
    source_format: SourceFormat.JSON,
  };
}

function normalizePlaintext(headers: RequestHeaders, body: string): NormalizedLog {
  const tenantId = getHeader(headers, TENANT_HEADER);
  if (!tenantId) {
    throw new MissingTenantError(TENANT_HEADER);
  }
  const tenant = tenantIdSchema.safeParse(tenantId);
  if (!tenant.success) {
    throw new ValidationError(`Invalid ${TENANT_HEADER} header`, { issues: tenant.error.issues });
  }

  return {
    tenant_id: tenant.data,
    original_text: body,
    source_format: SourceFormat.PLAINTEXT,
  };
}

/**
 * Convert an inbound request into a canonical log.
 *
 * JSON bodies carry `tenant_id`, optional `log_id` and `text`; every other
 * content type is raw text with the tenant in the `x-tenant-id` header.
 * Throws a NormalizationError subclass, or `ValidationError` for
 * wrongly typed or oversize fields.
 */
export function normalize(
  contentType: string | undefined,
  headers: RequestHeaders,
  body: string | undefined
): NormalizedLog {
  if (isStructuredContentType(contentType)) {
    return normalizeJson(headers, body ?? '');
  }
  return normalizePlaintext(headers, body ?? '');
}
