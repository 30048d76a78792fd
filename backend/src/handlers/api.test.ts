import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import { createApiHandler } from './api.js';
import { InMemoryLogStore, InMemoryQueueChannel } from '../lib/services/memory.js';

interface EventInit {
  method: string;
  path: string;
  headers?: Record<string, string>;
  query?: Record<string, string>;
  body?: string;
  isBase64Encoded?: boolean;
}

function buildEvent(init: EventInit): APIGatewayProxyEventV2 {
  return {
    version: '2.0',
    routeKey: '$default',
    rawPath: init.path,
    rawQueryString: new URLSearchParams(init.query).toString(),
    headers: init.headers ?? {},
    queryStringParameters: init.query,
    body: init.body,
    isBase64Encoded: init.isBase64Encoded ?? false,
    requestContext: {
      accountId: '123456789012',
      apiId: 'test-api',
      domainName: 'test.example.com',
      domainPrefix: 'test',
      http: {
        method: init.method,
        path: init.path,
        protocol: 'HTTP/1.1',
        sourceIp: '127.0.0.1',
        userAgent: 'vitest',
      },
      requestId: 'req-1',
      routeKey: '$default',
      stage: '$default',
      time: '15/Jan/2024:10:30:00 +0000',
      timeEpoch: 1705314600000,
    },
  };
}

const context: Context = {
  callbackWaitsForEmptyEventLoop: false,
  functionName: 'api',
  functionVersion: '$LATEST',
  invokedFunctionArn: 'arn:aws:lambda:us-east-1:123456789012:function:api',
  memoryLimitInMB: '256',
  awsRequestId: 'aws-req-1',
  logGroupName: '/aws/lambda/api',
  logStreamName: 'stream',
  getRemainingTimeInMillis: () => 30000,
  done: () => undefined,
  fail: () => undefined,
  succeed: () => undefined,
};

const storedEntry = {
  original_text: 'mail jane@example.com',
  modified_text: 'mail [REDACTED_EMAIL]',
  processed_at: '2024-01-15T11:00:00.000Z',
  source_format: 'PLAINTEXT' as const,
  redacted: true,
};

describe('api handler', () => {
  let queue: InMemoryQueueChannel;
  let store: InMemoryLogStore;
  let handler: ReturnType<typeof createApiHandler>;

  async function call(init: EventInit): Promise<{ statusCode?: number; body: unknown }> {
    const result = await handler(buildEvent(init), context);
    if (typeof result === 'string') {
      throw new Error('Expected a structured response');
    }
    const body: unknown = result.body ? JSON.parse(result.body) : undefined;
    return { statusCode: result.statusCode, body };
  }

  beforeEach(() => {
    queue = new InMemoryQueueChannel();
    store = new InMemoryLogStore();
    handler = createApiHandler({ queue, store });
  });

  it('reports health', async () => {
    const response = await call({ method: 'GET', path: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toMatchObject({ status: 'healthy', version: '0.1.0' });
  });

  describe('POST /ingest', () => {
    it('accepts a JSON log with 202 and queues it', async () => {
      const response = await call({
        method: 'POST',
        path: '/ingest',
        headers: { 'content-type': 'application/json' },
        body: '{"tenant_id":"tenant-1","log_id":"uuid-1234","text":"Customer 555-123-4567 logged in"}',
      });

      expect(response).toEqual({
        statusCode: 202,
        body: { status: 'accepted', tenant_id: 'tenant-1', log_id: 'uuid-1234' },
      });
      expect(queue.pending).toHaveLength(1);
    });

    it('decodes a base64 plaintext body', async () => {
      const response = await call({
        method: 'POST',
        path: '/ingest',
        headers: { 'content-type': 'text/plain', 'x-tenant-id': 'tenant-1' },
        body: Buffer.from('Raw log text here').toString('base64'),
        isBase64Encoded: true,
      });

      expect(response.statusCode).toBe(202);
      const [message] = queue.pending;
      expect(message && JSON.parse(message.body)).toMatchObject({
        tenant_id: 'tenant-1',
        original_text: 'Raw log text here',
        source_format: 'PLAINTEXT',
      });
    });

    it('returns 400 for plaintext without a tenant header', async () => {
      const response = await call({
        method: 'POST',
        path: '/ingest',
        headers: { 'content-type': 'text/plain' },
        body: 'hello',
      });

      expect(response).toEqual({
        statusCode: 400,
        body: {
          error: {
            code: 'MISSING_TENANT',
            message: 'Missing tenant header: x-tenant-id',
            requestId: 'req-1',
            details: { header: 'x-tenant-id' },
          },
        },
      });
      expect(queue.pending).toEqual([]);
    });

    it('returns 503 when the queue is down', async () => {
      queue.available = false;

      const response = await call({
        method: 'POST',
        path: '/ingest',
        headers: { 'content-type': 'text/plain', 'x-tenant-id': 'tenant-1' },
        body: 'hello',
      });

      expect(response).toEqual({
        statusCode: 503,
        body: {
          error: {
            code: 'QUEUE_UNAVAILABLE',
            message: 'Log could not be queued for processing',
            requestId: 'req-1',
            details: { reason: 'Error: Queue unavailable' },
          },
        },
      });
    });
  });

  describe('reads', () => {
    beforeEach(async () => {
      await store.put({ tenant_id: 'tenant-1', log_id: 'log-1' }, storedEntry);
    });

    it("returns the caller's entry", async () => {
      const response = await call({
        method: 'GET',
        path: '/logs/log-1',
        headers: { 'x-tenant-id': 'tenant-1' },
      });

      expect(response).toEqual({
        statusCode: 200,
        body: { tenant_id: 'tenant-1', log_id: 'log-1', ...storedEntry },
      });
    });

    it("returns 404 for another tenant's log id", async () => {
      const response = await call({
        method: 'GET',
        path: '/logs/log-1',
        headers: { 'x-tenant-id': 'tenant-2' },
      });

      expect(response).toEqual({
        statusCode: 404,
        body: { error: { code: 'NOT_FOUND', message: 'Log not found: log-1', requestId: 'req-1' } },
      });
    });

    it('decodes encoded path segments', async () => {
      await store.put({ tenant_id: 'tenant-1', log_id: 'a/b' }, storedEntry);

      const response = await call({
        method: 'GET',
        path: '/logs/a%2Fb',
        headers: { 'x-tenant-id': 'tenant-1' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.body).toMatchObject({ log_id: 'a/b' });
    });

    it('lists only the header tenant', async () => {
      await store.put({ tenant_id: 'tenant-2', log_id: 'log-2' }, storedEntry);

      const response = await call({
        method: 'GET',
        path: '/logs',
        headers: { 'X-Tenant-Id': 'tenant-1' },
        query: { limit: '10' },
      });

      expect(response).toEqual({
        statusCode: 200,
        body: { items: [{ tenant_id: 'tenant-1', log_id: 'log-1', ...storedEntry }], hasMore: false },
      });
    });

    it('returns 503 when the store read fails', async () => {
      vi.spyOn(store, 'get').mockRejectedValueOnce(new Error('socket hang up'));

      const response = await call({
        method: 'GET',
        path: '/logs/log-1',
        headers: { 'x-tenant-id': 'tenant-1' },
      });

      expect(response).toEqual({
        statusCode: 503,
        body: {
          error: {
            code: 'STORE_UNAVAILABLE',
            message: 'Log store is unavailable',
            requestId: 'req-1',
            details: { reason: 'Error: socket hang up' },
          },
        },
      });
    });

    it('rejects malformed percent-encoding with 400', async () => {
      const response = await call({
        method: 'GET',
        path: '/logs/%E0%A4%A',
        headers: { 'x-tenant-id': 'tenant-1' },
      });

      expect(response).toEqual({
        statusCode: 400,
        body: {
          error: {
            code: 'VALIDATION_ERROR',
            message: 'Malformed percent-encoding in path',
            requestId: 'req-1',
            details: { segment: '%E0%A4%A' },
          },
        },
      });
    });

    it('rejects an empty log id without reading the store', async () => {
      const get = vi.spyOn(store, 'get');

      const response = await call({
        method: 'GET',
        path: '/logs/',
        headers: { 'x-tenant-id': 'tenant-1' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.body).toMatchObject({ error: { code: 'VALIDATION_ERROR', message: 'Validation failed' } });
      expect(get).not.toHaveBeenCalled();
    });

    it('requires the tenant header', async () => {
      const response = await call({ method: 'GET', path: '/logs' });

      expect(response.statusCode).toBe(400);
      expect(response.body).toMatchObject({ error: { code: 'MISSING_TENANT' } });
    });

    it('rejects an out-of-range page size', async () => {
      const response = await call({
        method: 'GET',
        path: '/logs',
        headers: { 'x-tenant-id': 'tenant-1' },
        query: { limit: '0' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.body).toMatchObject({ error: { code: 'VALIDATION_ERROR', message: 'Validation failed' } });
    });
  });

  it('returns 404 for unknown routes', async () => {
    const response = await call({ method: 'DELETE', path: '/logs' });

    expect(response).toEqual({
      statusCode: 404,
      body: { error: { code: 'NOT_FOUND', message: 'Route not found: DELETE /logs', requestId: 'req-1' } },
    });
  });
});
