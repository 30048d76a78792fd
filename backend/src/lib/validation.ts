import { z } from 'zod';
import { SourceFormat } from '@logvault/shared';

// DynamoDB caps partition keys at 2048 bytes and sort keys at 1024
export const MAX_TENANT_ID_BYTES = 2048;
export const MAX_LOG_ID_BYTES = 1024;

function withinBytes(limit: number) {
  return (value: string) => Buffer.byteLength(value, 'utf8') <= limit;
}

// Common validators
export const tenantIdSchema = z
  .string()
  .min(1)
  .refine(withinBytes(MAX_TENANT_ID_BYTES), { message: `Must be at most ${MAX_TENANT_ID_BYTES} bytes` });
export const logIdSchema = z
  .string()
  .min(1)
  .refine(withinBytes(MAX_LOG_ID_BYTES), { message: `Must be at most ${MAX_LOG_ID_BYTES} bytes` });
export const isoTimestampSchema = z.string().datetime();

export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional().default(20),
  cursor: z.string().optional(),
});

// Body of an application/json ingest request
export const jsonLogInputSchema = z.object({
  tenant_id: tenantIdSchema,
  // "" is treated as absent and gets a generated id
  log_id: z
    .union([logIdSchema, z.literal('')])
    .optional()
    .transform((value) => (value ? value : undefined)),
  text: z.string(),
});

// Queue wire format; anything else reaching the worker is corruption
export const ingestEnvelopeSchema = z.object({
  tenant_id: tenantIdSchema,
  log_id: logIdSchema,
  original_text: z.string(),
  source_format: z.nativeEnum(SourceFormat),
  attempt_count: z.number().int().min(0),
  enqueued_at: isoTimestampSchema,
});

export const listLogsQuerySchema = paginationSchema;

// Export types
export type ListLogsQueryInput = z.infer<typeof listLogsQuerySchema>;
