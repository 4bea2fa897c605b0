import type { IngestJob, IngestRunParams } from '@statbridge/db';
import type { IngestConfig } from '../env.js';
import type { Logger } from '../logger.js';
import type { RunLock } from '../run-lock.js';
import type { CsvRow } from '../tabular/csv-export.js';
import type { ReferenceData } from './reference-data.js';
import type { IngestRun, RunLedger } from './run-ledger.js';
import type { IngestSinks } from './sinks.js';

export type PipelineContext = {
  run: IngestRun;
  filePath: string;
  params: IngestRunParams;
  reference: ReferenceData;
  sinks: IngestSinks;
  config: IngestConfig;
  log: Logger;
};

export type PipelineResult = {
  resultTable: string;
  count: number;
  /** Rows removed because their country did not resolve. */
  dropped?: number;
  /** Flat copy of the persisted records for the optional CSV export. */
  csvRows?: readonly CsvRow[];
};

export type Processor = (ctx: PipelineContext) => Promise<PipelineResult>;

export type IngestDeps = {
  ledger: RunLedger;
  lock: RunLock;
  /** A fresh provider per run. */
  referenceData: () => ReferenceData;
  sinks: IngestSinks;
  config: IngestConfig;
  logger: Logger;
  processors: Readonly<Record<IngestJob, Processor>>;
};

export type IngestOutcome = {
  ok: true;
  fileSeq: number;
  job: IngestJob;
  resultTable: string;
  count: number;
  csvFile: string | null;
};
