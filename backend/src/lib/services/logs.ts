import type {
  LogKey,
  PaginatedResponse,
  ProcessedLogAttributes,
  ProcessedLogEntry,
} from '@logvault/shared';
import { config } from '../config.js';
import { putItem, getItem, queryItems, encodeCursor, decodeCursor } from '../dynamodb.js';
import { ValidationError } from '../errors.js';
import type { ListLogsQueryInput } from '../validation.js';

const TABLE = config.tables.processedLogs;

export interface StoreWriteOptions {
  signal?: AbortSignal;
}

/**
 * Persistence for processed logs in one pooled table.
 *
 * The tenant is a required part of every call, as the key on writes and
 * reads and as the partition on listings. There is no cross-tenant query.
 */
export interface ProcessedLogStore {
  // Full overwrite on the composite key, safe to repeat
  put(key: LogKey, attributes: ProcessedLogAttributes, options?: StoreWriteOptions): Promise<void>;
  get(key: LogKey): Promise<ProcessedLogEntry | null>;
  list(tenantId: string, query: ListLogsQueryInput): Promise<PaginatedResponse<ProcessedLogEntry>>;
}

export async function putProcessedLog(
  key: LogKey,
  attributes: ProcessedLogAttributes,
  options?: StoreWriteOptions
): Promise<void> {
  const entry: ProcessedLogEntry = {
    tenant_id: key.tenant_id,
    log_id: key.log_id,
    ...attributes,
  };

  await putItem({ TableName: TABLE, Item: entry }, { abortSignal: options?.signal });
}

export async function getProcessedLog(key: LogKey): Promise<ProcessedLogEntry | null> {
  return getItem<ProcessedLogEntry>({
    TableName: TABLE,
    Key: {
      tenant_id: key.tenant_id,
      log_id: key.log_id,
    },
  });
}

export async function listTenantLogs(
  tenantId: string,
  query: ListLogsQueryInput
): Promise<PaginatedResponse<ProcessedLogEntry>> {
  const limit = Math.min(query.limit || config.api.defaultPageSize, config.api.maxPageSize);
  const exclusiveStartKey = query.cursor ? decodeCursor(query.cursor) : undefined;

  if (query.cursor && !exclusiveStartKey) {
    throw new ValidationError('Invalid pagination cursor');
  }
  // A cursor is a raw table key; never let one walk into another tenant's partition
  if (exclusiveStartKey && exclusiveStartKey.tenant_id !== tenantId) {
    throw new ValidationError('Pagination cursor does not belong to this tenant');
  }

  const { items, lastEvaluatedKey } = await queryItems<ProcessedLogEntry>({
    TableName: TABLE,
    KeyConditionExpression: 'tenant_id = :tid',
    ExpressionAttributeValues: {
      ':tid': tenantId,
    },
    Limit: limit,
    ExclusiveStartKey: exclusiveStartKey,
  });

  return {
    items,
    cursor: lastEvaluatedKey ? encodeCursor(lastEvaluatedKey) : undefined,
    hasMore: !!lastEvaluatedKey,
  };
}

export const dynamoLogStore: ProcessedLogStore = {
  put: putProcessedLog,
  get: getProcessedLog,
  list: listTenantLogs,
};
