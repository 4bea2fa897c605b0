import { db, type IngestJob, type IngestRunParams, ingestRunsTable, type IngestStatus } from '@statbridge/db';
import { and, count, desc, eq, gte, lt } from 'drizzle-orm';

export type IngestRun = typeof ingestRunsTable.$inferSelect;

export type RunOutcome = {
  resultTable: string;
  count: number;
  remark: string;
  csvFile?: string | null;
};

/** Lifecycle calls made by the ingest runtime; keyed by the file reference. */
export interface RunLedger {
  get(fileSeq: number): Promise<IngestRun | null>;
  start(fileSeq: number): Promise<void>;
  success(fileSeq: number, outcome: RunOutcome): Promise<void>;
  fail(fileSeq: number, remark: string): Promise<void>;
}

const REMARK_MAX = 2000;

export async function getIngestRun(fileSeq: number): Promise<IngestRun | null> {
  const rows = await db
    .select()
    .from(ingestRunsTable)
    .where(eq(ingestRunsTable.fileSeq, fileSeq))
    .limit(1);
  return rows[0] ?? null;
}

export async function registerIngestRun(params: {
  job: IngestJob;
  fileDir: string;
  fileName: string;
  originalName?: string;
  params?: IngestRunParams;
}): Promise<IngestRun> {
  const rows = await db
    .insert(ingestRunsTable)
    .values({
      job: params.job,
      fileDir: params.fileDir,
      fileName: params.fileName,
      originalName: params.originalName ?? null,
      params: params.params ?? {},
      status: 'pending',
    })
    .returning();

  const row = rows[0];
  if (!row) throw new Error('registerIngestRun: insert returned no rows');
  return row;
}

export async function startIngestRun(fileSeq: number): Promise<void> {
  await db
    .update(ingestRunsTable)
    .set({
      status: 'running',
      startedAt: new Date(),
      finishedAt: null,
      processedCount: 0,
      remark: null,
      csvFile: null,
    })
    .where(eq(ingestRunsTable.fileSeq, fileSeq));
}

export async function succeedIngestRun(fileSeq: number, outcome: RunOutcome): Promise<void> {
  await db
    .update(ingestRunsTable)
    .set({
      status: 'succeeded',
      finishedAt: new Date(),
      resultTable: outcome.resultTable,
      processedCount: outcome.count,
      remark: outcome.remark.slice(0, REMARK_MAX),
      csvFile: outcome.csvFile ?? null,
    })
    .where(eq(ingestRunsTable.fileSeq, fileSeq));
}

export async function failIngestRun(fileSeq: number, remark: string): Promise<void> {
  await db
    .update(ingestRunsTable)
    .set({ status: 'failed', finishedAt: new Date(), remark: remark.slice(0, REMARK_MAX) })
    .where(eq(ingestRunsTable.fileSeq, fileSeq));
}

export type IngestRunFilter = {
  page: number;
  size: number;
  status?: IngestStatus;
  job?: IngestJob;
  from?: string; // YYYY-MM-DD
  to?: string; // YYYY-MM-DD, inclusive
};

function dayStart(day: string, offsetDays = 0) {
  const d = new Date(`${day}T00:00:00.000Z`);
  d.setUTCDate(d.getUTCDate() + offsetDays);
  return d;
}

export async function listIngestRuns(filter: IngestRunFilter) {
  const where = and(
    filter.status ? eq(ingestRunsTable.status, filter.status) : undefined,
    filter.job ? eq(ingestRunsTable.job, filter.job) : undefined,
    filter.from ? gte(ingestRunsTable.createdAt, dayStart(filter.from)) : undefined,
    filter.to ? lt(ingestRunsTable.createdAt, dayStart(filter.to, 1)) : undefined
  );

  const [rows, totals] = await Promise.all([
    db
      .select()
      .from(ingestRunsTable)
      .where(where)
      .orderBy(desc(ingestRunsTable.fileSeq))
      .limit(filter.size)
      .offset((filter.page - 1) * filter.size),
    db.select({ total: count() }).from(ingestRunsTable).where(where),
  ]);

  return { rows, total: totals[0]?.total ?? 0, page: filter.page, size: filter.size };
}

/** Administrative removal; the ingest runtime never deletes ledger entries. */
export async function deleteIngestRun(fileSeq: number): Promise<boolean> {
  const rows = await db
    .delete(ingestRunsTable)
    .where(eq(ingestRunsTable.fileSeq, fileSeq))
    .returning({ fileSeq: ingestRunsTable.fileSeq });
  return rows.length > 0;
}

export const drizzleRunLedger: RunLedger = {
  get: getIngestRun,
  start: startIngestRun,
  success: succeedIngestRun,
  fail: failIngestRun,
};
