import type {
  DeadLetterMessage,
  IngestEnvelope,
  LogKey,
  PaginatedResponse,
  ProcessedLogAttributes,
  ProcessedLogEntry,
} from '@logvault/shared';
import { config } from '../config.js';
import { encodeCursor, decodeCursor } from '../dynamodb.js';
import { ValidationError } from '../errors.js';
import type { DeadLetterChannel, QueueChannel } from '../sqs.js';
import type { ListLogsQueryInput } from '../validation.js';
import { handleDelivery, type Delivery, type DeliveryDeps } from './delivery.js';
import type { ProcessedLogStore, StoreWriteOptions } from './logs.js';

// In-process store with the same keying and paging rules as the DynamoDB table
export class InMemoryLogStore implements ProcessedLogStore {
  private readonly partitions = new Map<string, Map<string, ProcessedLogEntry>>();

  async put(key: LogKey, attributes: ProcessedLogAttributes, _options?: StoreWriteOptions): Promise<void> {
    let partition = this.partitions.get(key.tenant_id);
    if (!partition) {
      partition = new Map();
      this.partitions.set(key.tenant_id, partition);
    }
    partition.set(key.log_id, { tenant_id: key.tenant_id, log_id: key.log_id, ...attributes });
  }

  async get(key: LogKey): Promise<ProcessedLogEntry | null> {
    return this.partitions.get(key.tenant_id)?.get(key.log_id) ?? null;
  }

  async list(tenantId: string, query: ListLogsQueryInput): Promise<PaginatedResponse<ProcessedLogEntry>> {
    const limit = Math.min(query.limit || config.api.defaultPageSize, config.api.maxPageSize);
    const start = query.cursor ? decodeCursor(query.cursor) : undefined;
    if (query.cursor && (!start || start.tenant_id !== tenantId)) {
      throw new ValidationError('Invalid pagination cursor');
    }

    const sorted = [...(this.partitions.get(tenantId)?.values() ?? [])].sort((a, b) =>
      a.log_id < b.log_id ? -1 : a.log_id > b.log_id ? 1 : 0
    );
    const after = start ? sorted.filter((entry) => entry.log_id > String(start.log_id)) : sorted;
    const items = after.slice(0, limit);
    const hasMore = after.length > limit;
    const last = items[items.length - 1];

    return {
      items,
      cursor: hasMore && last ? encodeCursor({ tenant_id: last.tenant_id, log_id: last.log_id }) : undefined,
      hasMore,
    };
  }

  // Number of entries across all tenants
  get size(): number {
    let total = 0;
    for (const partition of this.partitions.values()) {
      total += partition.size;
    }
    return total;
  }
}

export interface DrainStats {
  acked: number;
  retried: number;
}

/**
 * In-process at-least-once channel.
 *
 * Redelivers every message the consumer does not ack, counting receives the
 * way SQS does, and keeps dead letters for inspection.
 */
export class InMemoryQueueChannel implements QueueChannel, DeadLetterChannel {
  readonly pending: Delivery[] = [];
  readonly deadLetters: DeadLetterMessage[] = [];
  available = true;
  private sequence = 0;

  async submit(envelope: IngestEnvelope): Promise<void> {
    if (!this.available) {
      throw new Error('Queue unavailable');
    }
    this.sequence += 1;
    this.pending.push({
      messageId: `msg-${this.sequence}`,
      body: JSON.stringify(envelope),
      receiveCount: 0,
    });
  }

  async deadLetter(message: DeadLetterMessage): Promise<void> {
    this.deadLetters.push(message);
  }

  // Deliver until nothing is pending
  async drain(deps: Omit<DeliveryDeps, 'deadLetters'>): Promise<DrainStats> {
    const stats: DrainStats = { acked: 0, retried: 0 };
    let message = this.pending.shift();

    while (message) {
      const delivery: Delivery = { ...message, receiveCount: message.receiveCount + 1 };
      const decision = await handleDelivery(delivery, { ...deps, deadLetters: this });
      if (decision === 'ack') {
        stats.acked += 1;
      } else {
        stats.retried += 1;
        this.pending.push(delivery);
      }
      message = this.pending.shift();
    }

    return stats;
  }
}
