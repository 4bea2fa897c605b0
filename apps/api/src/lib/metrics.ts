import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: 'statbridge_' });

type Labels = { job: string };

export const ingestRowsProcessed = new Counter({
  name: 'statbridge_ingest_rows_total',
  help: 'Records written by successful ingest runs.',
  labelNames: ['job'] as const,
  registers: [registry],
});

export const ingestRowsDropped = new Counter({
  name: 'statbridge_ingest_rows_dropped_total',
  help: 'Rows filtered out because their country did not resolve.',
  labelNames: ['job'] as const,
  registers: [registry],
});

export const ingestErrors = new Counter({
  name: 'statbridge_ingest_errors_total',
  help: 'Failed ingest runs by failure kind.',
  labelNames: ['job', 'kind'] as const,
  registers: [registry],
});

export const ingestDuration = new Histogram({
  name: 'statbridge_ingest_duration_seconds',
  help: 'Ingest run duration by job.',
  labelNames: ['job'] as const,
  buckets: [0.1, 0.5, 1, 2, 5, 10, 30, 60, 120, 300],
  registers: [registry],
});

export const ingestLastRun = new Gauge({
  name: 'statbridge_ingest_last_run_timestamp',
  help: 'UNIX timestamp (seconds) of the last successful run per job.',
  labelNames: ['job'] as const,
  registers: [registry],
});

export const ingestRunsSwept = new Counter({
  name: 'statbridge_ingest_runs_swept_total',
  help: 'Running ingest runs marked failed by the stale sweeper.',
  registers: [registry],
});

export function startIngestTimer(labels: Labels) {
  const end = ingestDuration.startTimer(labels);
  return () => {
    end();
  };
}

export function setLastRunNow(labels: Labels) {
  ingestLastRun.set(labels, Date.now() / 1000);
}
