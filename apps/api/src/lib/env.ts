export type IngestConfig = {
  /** Last year that receives a forecast slot. */
  horizonYear: number;
  /** Partner label on the synthesized residual trade row. */
  residualLabel: string;
  /** Minutes after which a `running` ledger entry counts as stale. */
  staleMinutes: number;
  /** When set, each run also writes its records as CSV here. */
  csvOutputDir: string | null;
};

type ApiRuntimeEnv = {
  nodeEnv: string;
  host: string;
  port: number;
  logLevel: string;
  ingest: IngestConfig;
};

function parsePort(name: string, fallback: number): number {
  const raw = (process.env[name] ?? '').trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
    throw new Error(`Invalid ${name}: expected integer port (1-65535), got "${raw}"`);
  }
  return parsed;
}

function parsePositiveInt(name: string, fallback: number): number {
  const raw = (process.env[name] ?? '').trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid ${name}: expected positive integer, got "${raw}"`);
  }
  return parsed;
}

export function loadIngestConfig(): IngestConfig {
  return {
    horizonYear: parsePositiveInt('INDICATOR_HORIZON_YEAR', 2051),
    residualLabel: (process.env.RESIDUAL_PARTNER_LABEL ?? '').trim() || 'other',
    staleMinutes: parsePositiveInt('INGEST_STALE_MINUTES', 30),
    csvOutputDir: (process.env.CSV_OUTPUT_DIR ?? '').trim() || null,
  };
}

export function validateApiRuntimeEnv(): ApiRuntimeEnv {
  const nodeEnv = (process.env.NODE_ENV ?? 'development').trim();

  if (!(process.env.DATABASE_URL ?? '').trim()) {
    throw new Error('Missing required API env vars: DATABASE_URL');
  }

  return {
    nodeEnv,
    host: (process.env.HOST ?? '0.0.0.0').trim() || '0.0.0.0',
    port: parsePort('PORT', 3001),
    logLevel: (process.env.LOG_LEVEL ?? 'info').trim() || 'info',
    ingest: loadIngestConfig(),
  };
}
