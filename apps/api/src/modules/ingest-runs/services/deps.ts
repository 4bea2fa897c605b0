import { loadIngestConfig } from '../../../lib/env.js';
import { createReferenceData } from '../../../lib/ingest/reference-data.js';
import { drizzleRunLedger } from '../../../lib/ingest/run-ledger.js';
import { drizzleSinks } from '../../../lib/ingest/sinks.js';
import type { IngestDeps } from '../../../lib/ingest/types.js';
import { logger } from '../../../lib/logger.js';
import { advisoryRunLock } from '../../../lib/run-lock.js';
import { JOB_PROCESSORS } from './jobs.js';

/** Production wiring: PostgreSQL ledger, sinks, lock and reference data. */
export function createIngestDeps(overrides: Partial<IngestDeps> = {}): IngestDeps {
  return {
    ledger: drizzleRunLedger,
    lock: advisoryRunLock,
    referenceData: () => createReferenceData(),
    sinks: drizzleSinks,
    config: loadIngestConfig(),
    logger,
    processors: JOB_PROCESSORS,
    ...overrides,
  };
}
