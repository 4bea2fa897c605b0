import { index, integer, jsonb, pgTable, serial, text, varchar } from 'drizzle-orm/pg-core';
import { ingestJobEnum, ingestStatusEnum, type TradeDirection } from '../enums.js';
import { auditColumns, createLifecycleColumn } from '../utils.js';

export type IngestRunParams = {
  direction?: TradeDirection;
  replaceAll?: boolean;
};

/** One row per submitted file; fileSeq is the run key. */
export const ingestRunsTable = pgTable(
  'ingest_runs',
  {
    fileSeq: serial('file_seq').primaryKey(),
    job: ingestJobEnum('job').notNull(),
    params: jsonb('params').$type<IngestRunParams>().notNull().default({}),
    fileDir: text('file_dir').notNull(),
    fileName: text('file_name').notNull(), // stored name on disk
    originalName: text('original_name'), // name as uploaded
    status: ingestStatusEnum('status').notNull().default('pending'),
    startedAt: createLifecycleColumn('started_at'),
    finishedAt: createLifecycleColumn('finished_at'),
    resultTable: varchar('result_table', { length: 64 }),
    processedCount: integer('processed_count').notNull().default(0),
    remark: text('remark'), // success message or failure reason
    csvFile: text('csv_file'),
    ...auditColumns(),
  },
  (t) => ({
    idxStatus: index('ingest_runs_status_idx').on(t.status),
    idxJob: index('ingest_runs_job_idx').on(t.job),
  })
);
