import { db, ingestRunsTable } from '@statbridge/db';
import type { Health } from '@statbridge/types';
import { and, count, eq, gte, sql } from 'drizzle-orm';
import { logger } from '../../lib/logger.js';

async function countRuns(where: ReturnType<typeof and>): Promise<number> {
  const rows = await db.select({ n: count() }).from(ingestRunsTable).where(where);
  return rows[0]?.n ?? 0;
}

export async function checkHealth(): Promise<Health> {
  const startedAt = Date.now();

  let dbOk = false;
  let dbLatencyMs: number | null = null;
  try {
    const t0 = Date.now();
    await db.execute(sql`select 1`);
    dbOk = true;
    dbLatencyMs = Date.now() - t0;
  } catch (err) {
    logger.warn({ err }, 'health: database ping failed');
  }

  let running: number | null = null;
  let failed24h: number | null = null;
  if (dbOk) {
    try {
      const since = new Date(Date.now() - 24 * 3600_000);
      [running, failed24h] = await Promise.all([
        countRuns(eq(ingestRunsTable.status, 'running')),
        countRuns(and(eq(ingestRunsTable.status, 'failed'), gte(ingestRunsTable.updatedAt, since))),
      ]);
    } catch (err) {
      // ledger counts are informational
      logger.warn({ err }, 'health: ledger counts unavailable');
    }
  }

  return {
    ok: dbOk,
    service: 'statbridge-api',
    time: {
      server: new Date().toISOString(),
      uptimeSec: Math.floor(process.uptime()),
      tz: Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC',
    },
    db: { ok: dbOk, latencyMs: dbLatencyMs },
    ingest: { running, failed24h },
    version: {
      commit: process.env.COMMIT_SHA || null,
      env: process.env.NODE_ENV || 'development',
    },
    durationMs: Date.now() - startedAt,
  };
}
