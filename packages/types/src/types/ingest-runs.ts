import { z } from 'zod/v4';
import {
  IngestJobSchema,
  IngestProcessBodySchema,
  IngestProcessResponseSchema,
  IngestRunIdParamSchema,
  IngestRunInsertSchema,
  IngestRunListQuerySchema,
  IngestRunListResponseSchema,
  IngestRunParamsSchema,
  IngestRunRegisterBodySchema,
  IngestRunSelectSchema,
  IngestStatusSchema,
  SweepStaleBodySchema,
  SweepStaleResponseSchema,
} from '../schemas/index.js';

export type IngestRun = z.infer<typeof IngestRunSelectSchema>;
export type IngestRunInsert = z.infer<typeof IngestRunInsertSchema>;
export type IngestJob = z.infer<typeof IngestJobSchema>;
export type IngestStatus = z.infer<typeof IngestStatusSchema>;
export type IngestRunParams = z.infer<typeof IngestRunParamsSchema>;
export type IngestRunIdParam = z.infer<typeof IngestRunIdParamSchema>;
export type IngestRunListQuery = z.infer<typeof IngestRunListQuerySchema>;
export type IngestRunListResponse = z.infer<typeof IngestRunListResponseSchema>;
export type IngestRunRegisterBody = z.infer<typeof IngestRunRegisterBodySchema>;
export type IngestProcessBody = z.infer<typeof IngestProcessBodySchema>;
export type IngestProcessResponse = z.infer<typeof IngestProcessResponseSchema>;
export type SweepStaleBody = z.infer<typeof SweepStaleBodySchema>;
export type SweepStaleResponse = z.infer<typeof SweepStaleResponseSchema>;
