import { z } from 'zod/v4';
import { createInsertSchema, createSelectSchema } from 'drizzle-zod';
import { ingestJobs, ingestRunsTable, ingestStatuses, tradeDirections } from '@statbridge/db';

export const IngestJobSchema = z.enum(ingestJobs);
export const IngestStatusSchema = z.enum(ingestStatuses);
export const TradeDirectionSchema = z.enum(tradeDirections);

export const IngestRunParamsSchema = z.object({
  direction: TradeDirectionSchema.optional(),
  replaceAll: z.boolean().optional(),
});

export const IngestRunSelectSchema = createSelectSchema(ingestRunsTable, {
  params: IngestRunParamsSchema,
});
export const IngestRunInsertSchema = createInsertSchema(ingestRunsTable, {
  params: IngestRunParamsSchema,
});

export const IngestRunIdParamSchema = z.object({
  fileSeq: z.coerce.number().int().positive(),
});

export const IngestRunListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  size: z.coerce.number().int().min(1).max(200).default(20),
  status: IngestStatusSchema.optional(),
  job: IngestJobSchema.optional(),
  // YYYY-MM-DD, inclusive, on createdAt
  from: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional(),
  to: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional(),
});

export const IngestRunListResponseSchema = z.object({
  rows: z.array(IngestRunSelectSchema),
  total: z.number().int(),
  page: z.number().int(),
  size: z.number().int(),
});

export const IngestRunRegisterBodySchema = z.object({
  job: IngestJobSchema,
  fileDir: z.string().min(1),
  fileName: z.string().min(1),
  originalName: z.string().min(1).optional(),
  params: IngestRunParamsSchema.optional(),
});

export const IngestProcessBodySchema = IngestRunParamsSchema;

export const IngestProcessResponseSchema = z.object({
  ok: z.literal(true),
  fileSeq: z.number().int(),
  job: IngestJobSchema,
  resultTable: z.string(),
  count: z.number().int(),
  csvFile: z.string().nullable(),
});

export const SweepStaleBodySchema = z.object({
  thresholdMinutes: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().positive().optional(),
});

export const SweepStaleResponseSchema = z.object({
  ok: z.literal(true),
  swept: z.number().int(),
  thresholdMinutes: z.number(),
  cutoff: z.date(),
});
