import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyResultV2,
  Context,
} from 'aws-lambda';
import { ZodError } from 'zod';
import type { ApiError, HealthResponse, IngestAcceptedResponse } from '@logvault/shared';
import { config } from '../lib/config.js';
import { createRequestLogger, type Logger } from '../lib/logger.js';
import {
  AppError,
  MissingTenantError,
  NotFoundError,
  StoreUnavailableError,
  ValidationError,
  describeError,
} from '../lib/errors.js';
import { SqsQueueChannel, type QueueChannel } from '../lib/sqs.js';

// Services
import { acceptRequest } from '../lib/services/intake.js';
import { dynamoLogStore, type ProcessedLogStore } from '../lib/services/logs.js';
import { getHeader, TENANT_HEADER } from '../lib/services/normalizer.js';

// Validation schemas
import { listLogsQuerySchema, logIdSchema, tenantIdSchema } from '../lib/validation.js';

// Route handler type
type RouteHandler = (
  event: APIGatewayProxyEventV2,
  context: HandlerContext
) => Promise<APIGatewayProxyResultV2>;

interface HandlerContext {
  requestId: string;
  logger: Logger;
}

export interface ApiDeps {
  queue: QueueChannel;
  store: ProcessedLogStore;
}

// Parse path parameters
function getPathParam(event: APIGatewayProxyEventV2, name: string): string {
  return event.pathParameters?.[name] || '';
}

// Parse query parameters
function getQueryParams(event: APIGatewayProxyEventV2): Record<string, string> {
  const params = event.queryStringParameters || {};
  // Filter out undefined values
  return Object.fromEntries(
    Object.entries(params).filter((entry): entry is [string, string] => entry[1] !== undefined)
  );
}

// Raw body text; API Gateway base64-encodes anything it does not treat as text
function getBody(event: APIGatewayProxyEventV2): string | undefined {
  if (event.body === undefined) {
    return undefined;
  }
  return event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf-8') : event.body;
}

// Reads are scoped to the tenant named in the header, never to one found in a path or query
function requireTenant(event: APIGatewayProxyEventV2): string {
  const tenantId = getHeader(event.headers || {}, TENANT_HEADER);
  if (!tenantId) {
    throw new MissingTenantError(TENANT_HEADER);
  }
  return tenantIdSchema.parse(tenantId);
}

// A failing read is the store's fault, not the caller's
async function readStore<T>(read: () => Promise<T>): Promise<T> {
  try {
    return await read();
  } catch (error) {
    if (error instanceof AppError) {
      throw error;
    }
    throw new StoreUnavailableError(describeError(error));
  }
}

// Create JSON response
function jsonResponse(
  statusCode: number,
  body: unknown,
  headers?: Record<string, string>
): APIGatewayProxyResultV2 {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(body),
  };
}

// Route definitions
function buildRoutes(deps: ApiDeps): Record<string, { handler: RouteHandler }> {
  return {
    // Public routes
    'GET /health': {
      handler: async () => {
        const response: HealthResponse = {
          status: 'healthy',
          timestamp: new Date().toISOString(),
          version: config.version,
        };
        return jsonResponse(200, response);
      },
    },

    // Ingest
    'POST /ingest': {
      handler: async (event, ctx) => {
        const result = await acceptRequest(
          { headers: event.headers || {}, body: getBody(event) },
          { queue: deps.queue, logger: ctx.logger }
        );
        if (result.status === 'rejected') {
          return jsonResponse(result.error.statusCode, result.error.toApiError(ctx.requestId));
        }
        const response: IngestAcceptedResponse = {
          status: 'accepted',
          tenant_id: result.envelope.tenant_id,
          log_id: result.envelope.log_id,
        };
        return jsonResponse(202, response);
      },
    },

    // Tenant-scoped reads
    'GET /logs': {
      handler: async (event) => {
        const tenantId = requireTenant(event);
        const query = listLogsQuerySchema.parse(getQueryParams(event));
        const result = await readStore(() => deps.store.list(tenantId, query));
        return jsonResponse(200, result);
      },
    },
    'GET /logs/{logId}': {
      handler: async (event) => {
        const tenantId = requireTenant(event);
        const logId = logIdSchema.parse(getPathParam(event, 'logId'));
        const entry = await readStore(() => deps.store.get({ tenant_id: tenantId, log_id: logId }));
        if (!entry) {
          throw new NotFoundError('Log', logId);
        }
        return jsonResponse(200, entry);
      },
    },
  };
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError('Malformed percent-encoding in path', { segment });
  }
}

// Match route to handler
function matchRoute(
  routes: Record<string, { handler: RouteHandler }>,
  method: string,
  path: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  const routeKey = `${method} ${path}`;

  // Direct match
  if (routes[routeKey]) {
    return { handler: routes[routeKey].handler, params: {} };
  }

  // Pattern matching with path parameters
  for (const [pattern, route] of Object.entries(routes)) {
    const [patternMethod, patternPath] = pattern.split(' ');
    if (patternMethod !== method) continue;

    const patternParts = patternPath.split('/');
    const pathParts = path.split('/');

    if (patternParts.length !== pathParts.length) continue;

    const params: Record<string, string> = {};
    let matches = true;

    for (let i = 0; i < patternParts.length; i++) {
      if (patternParts[i].startsWith('{') && patternParts[i].endsWith('}')) {
        const paramName = patternParts[i].slice(1, -1);
        params[paramName] = decodePathSegment(pathParts[i]);
      } else if (patternParts[i] !== pathParts[i]) {
        matches = false;
        break;
      }
    }

    if (matches) {
      return { handler: route.handler, params };
    }
  }

  return null;
}

export function createApiHandler(deps: ApiDeps) {
  const routes = buildRoutes(deps);

  return async function handler(
    event: APIGatewayProxyEventV2,
    _context: Context
  ): Promise<APIGatewayProxyResultV2> {
    const requestId = event.requestContext.requestId;
    const logger = createRequestLogger(requestId);
    const method = event.requestContext.http.method;
    const path = event.rawPath;

    logger.info({ method, path }, 'Request received');

    try {
      // Match route
      const match = matchRoute(routes, method, path);

      if (!match) {
        return jsonResponse(404, {
          error: {
            code: 'NOT_FOUND',
            message: `Route not found: ${method} ${path}`,
            requestId,
          },
        });
      }

      // Inject path parameters
      event.pathParameters = { ...event.pathParameters, ...match.params };

      const handlerContext: HandlerContext = {
        requestId,
        logger,
      };

      // Execute handler
      const response = await match.handler(event, handlerContext);

      // Log status code if available (response can be string for HTTP API format 2.0)
      const statusCode = typeof response === 'object' && response !== null ? response.statusCode : undefined;
      logger.info({ statusCode }, 'Request completed');

      return response;
    } catch (error) {
      // Handle known errors
      if (error instanceof AppError) {
        logger.warn({ error: error.message, code: error.code }, 'Application error');
        return jsonResponse(error.statusCode, error.toApiError(requestId));
      }

      // Handle Zod validation errors
      if (error instanceof ZodError) {
        logger.warn({ errors: error.issues }, 'Validation error');
        const body: ApiError = {
          error: {
            code: 'VALIDATION_ERROR',
            message: 'Validation failed',
            requestId,
            details: { issues: error.issues },
          },
        };
        return jsonResponse(400, body);
      }

      // Unknown errors
      logger.error({ error }, 'Unexpected error');
      return jsonResponse(500, {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      });
    }
  };
}

// Main handler
export const handler = createApiHandler({
  queue: new SqsQueueChannel(),
  store: dynamoLogStore,
});
