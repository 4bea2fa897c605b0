import { db, ingestRunsTable } from '@statbridge/db';
import { and, asc, eq, inArray, lt, sql } from 'drizzle-orm';
import { loadIngestConfig } from '../env.js';
import { ingestRunsSwept } from '../metrics.js';

/**
 * Mark runs left in `running` (crashed process, killed container) as failed.
 *
 * @param opts.thresholdMinutes  Stale when updatedAt < now - threshold (default: INGEST_STALE_MINUTES)
 * @param opts.limit             Max rows per call; no cap when omitted
 */
export async function sweepStaleRuns(
  opts: {
    thresholdMinutes?: number;
    limit?: number;
  } = {}
) {
  const thresholdMinutes = opts.thresholdMinutes ?? loadIngestConfig().staleMinutes;

  const cutoff = new Date(Date.now() - thresholdMinutes * 60_000);
  const patch = {
    status: 'failed' as const,
    remark: `stale run > ${thresholdMinutes}m`,
    finishedAt: sql`now()`,
    updatedAt: sql`now()`,
  };

  let swept: number;
  if (opts.limit && opts.limit > 0) {
    const stale = await db
      .select({ fileSeq: ingestRunsTable.fileSeq })
      .from(ingestRunsTable)
      .where(and(eq(ingestRunsTable.status, 'running'), lt(ingestRunsTable.updatedAt, cutoff)))
      .orderBy(asc(ingestRunsTable.updatedAt))
      .limit(opts.limit);

    const ids = stale.map((r) => r.fileSeq);
    if (ids.length === 0) return { ok: true as const, swept: 0, thresholdMinutes, cutoff };

    const rows = await db
      .update(ingestRunsTable)
      .set(patch)
      .where(inArray(ingestRunsTable.fileSeq, ids))
      .returning({ fileSeq: ingestRunsTable.fileSeq });
    swept = rows.length;
  } else {
    const rows = await db
      .update(ingestRunsTable)
      .set(patch)
      .where(and(eq(ingestRunsTable.status, 'running'), lt(ingestRunsTable.updatedAt, cutoff)))
      .returning({ fileSeq: ingestRunsTable.fileSeq });
    swept = rows.length;
  }

  ingestRunsSwept.inc(swept);
  return { ok: true as const, swept, thresholdMinutes, cutoff };
}
