import type { IngestRunParams } from '@statbridge/db';
import { join } from 'node:path';
import {
  DataProcessingError,
  errorMessage,
  IngestError,
  RunLockedError,
  RunNotFoundError,
  SystemError,
} from '../errors.js';
import {
  ingestErrors,
  ingestRowsDropped,
  ingestRowsProcessed,
  setLastRunNow,
  startIngestTimer,
} from '../metrics.js';
import { ingestLockKey } from '../run-lock.js';
import { writeCsvExport } from '../tabular/csv-export.js';
import { validateFile } from '../tabular/file-validation.js';
import type { IngestDeps, IngestOutcome, PipelineResult, Processor } from './types.js';

export const SUCCESS_REMARK = 'Data processing completed.';

function toIngestError(err: unknown): IngestError {
  return err instanceof IngestError ? err : new SystemError({ cause: err });
}

async function runProcessor(processor: Processor, ctx: Parameters<Processor>[0]) {
  try {
    return await processor(ctx);
  } catch (err) {
    if (err instanceof IngestError) throw err;
    throw new DataProcessingError(`Data processing failed: ${errorMessage(err)}`, { cause: err });
  }
}

/**
 * Process one registered file: lock it, mark the ledger entry running, run the
 * job's processor and close the entry as succeeded or failed. Errors are
 * rethrown after the ledger records them.
 */
export async function runIngest(
  fileSeq: number,
  deps: IngestDeps,
  overrides: IngestRunParams = {}
): Promise<IngestOutcome> {
  const run = await deps.ledger.get(fileSeq);
  if (!run) throw new RunNotFoundError(fileSeq);

  const lock = await deps.lock.acquire(ingestLockKey(fileSeq));
  if (!lock) throw new RunLockedError(fileSeq);

  const labels = { job: run.job };
  const log = deps.logger.child({ job: run.job, fileSeq });
  const end = startIngestTimer(labels);

  try {
    let result: PipelineResult;
    let csvFile: string | null = null;
    try {
      await deps.ledger.start(fileSeq);
      log.info({ file: run.fileName }, 'ingest started');

      const filePath = await validateFile(join(run.fileDir, run.fileName));
      result = await runProcessor(deps.processors[run.job], {
        run,
        filePath,
        params: { ...run.params, ...overrides },
        reference: deps.referenceData(),
        sinks: deps.sinks,
        config: deps.config,
        log,
      });

      if (deps.config.csvOutputDir && result.csvRows) {
        csvFile = await writeCsvExport(deps.config.csvOutputDir, result.resultTable, result.csvRows);
      }

      await deps.ledger.success(fileSeq, {
        resultTable: result.resultTable,
        count: result.count,
        remark: SUCCESS_REMARK,
        csvFile,
      });
    } catch (err) {
      const failure = toIngestError(err);
      ingestErrors.inc({ job: run.job, kind: failure.kind });
      log.error({ err, kind: failure.kind, code: failure.code }, 'ingest failed');
      try {
        await deps.ledger.fail(fileSeq, failure.message);
      } catch (ledgerErr) {
        // The run's own failure stays the one reported.
        log.error({ err: ledgerErr, code: failure.code }, 'ledger could not record the failure');
      }
      throw failure;
    }

    ingestRowsProcessed.inc(labels, result.count);
    if (result.dropped) ingestRowsDropped.inc(labels, result.dropped);
    setLastRunNow(labels);
    log.info({ count: result.count, dropped: result.dropped ?? 0 }, 'ingest succeeded');

    return {
      ok: true,
      fileSeq,
      job: run.job,
      resultTable: result.resultTable,
      count: result.count,
      csvFile,
    };
  } finally {
    end();
    await lock.release();
  }
}
