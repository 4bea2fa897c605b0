import type { IngestJob } from '@statbridge/db';
import { readFile } from 'node:fs/promises';
import { basename, dirname } from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { JOB_PROCESSORS } from '../../modules/ingest-runs/services/jobs.js';
import {
  DataProcessingError,
  DataValidationError,
  FileNotReadableError,
  RunLockedError,
  RunNotFoundError,
  SystemError,
} from '../errors.js';
import {
  makeRun,
  MemoryLedger,
  MemoryLock,
  memorySinks,
  silentLogger,
  staticReference,
  testConfig,
  writeTextFile,
} from '../tests/ingest-fakes.js';
import { runIngest, SUCCESS_REMARK } from './run-ingest.js';
import type { IngestConfig } from '../env.js';
import type { IngestDeps, Processor } from './types.js';

async function setup(
  processor: Processor,
  opts: { ledger?: MemoryLedger; config?: IngestConfig; job?: IngestJob } = {}
) {
  const path = await writeTextFile('기간,국가\n2024,독일\n', 'countries.csv');
  const job = opts.job ?? 'customs:countries';
  const ledger = opts.ledger ?? new MemoryLedger();
  ledger.runs.set(
    1,
    makeRun({ job, fileDir: dirname(path), fileName: basename(path), params: { direction: 'export' } })
  );
  const lock = new MemoryLock();
  const deps: IngestDeps = {
    ledger,
    lock,
    referenceData: () => staticReference({}),
    sinks: memorySinks().sinks,
    config: opts.config ?? testConfig,
    logger: silentLogger,
    processors: { ...JOB_PROCESSORS, [job]: processor },
  };
  return { deps, ledger, lock, path };
}

describe('runIngest', () => {
  it('runs the processor and records success', async () => {
    const processor = vi.fn<Processor>(async () => ({
      resultTable: 'customs_country_stats',
      count: 2,
      dropped: 1,
    }));
    const { deps, ledger, lock, path } = await setup(processor);

    const outcome = await runIngest(1, deps, { replaceAll: true });

    expect(outcome).toEqual({
      ok: true,
      fileSeq: 1,
      job: 'customs:countries',
      resultTable: 'customs_country_stats',
      count: 2,
      csvFile: null,
    });
    const ctx = processor.mock.calls[0]?.[0];
    expect(ctx?.filePath).toBe(path);
    expect(ctx?.params).toEqual({ direction: 'export', replaceAll: true });
    expect(ledger.events.map((e) => e.type)).toEqual(['start', 'success']);
    expect(ledger.runs.get(1)).toMatchObject({
      status: 'succeeded',
      processedCount: 2,
      resultTable: 'customs_country_stats',
      remark: SUCCESS_REMARK,
    });
    expect(lock.held.size).toBe(0);
  });

  it('records an ingest error as the failure remark and rethrows it', async () => {
    const failure = new DataValidationError('Missing required columns: 국가');
    const { deps, ledger, lock } = await setup(async () => {
      throw failure;
    });

    await expect(runIngest(1, deps)).rejects.toBe(failure);
    expect(ledger.runs.get(1)).toMatchObject({
      status: 'failed',
      remark: 'Missing required columns: 국가',
    });
    expect(lock.held.size).toBe(0);
  });

  it('wraps unexpected processor errors as data processing failures', async () => {
    const { deps, ledger } = await setup(async () => {
      throw new Error('boom');
    });

    const err = await runIngest(1, deps).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DataProcessingError);
    expect(err).toMatchObject({ code: 'E2001', message: 'Data processing failed: boom' });
    expect(ledger.runs.get(1)?.remark).toBe('Data processing failed: boom');
  });

  it('fails with E1001 when the stored file is gone', async () => {
    const processor = vi.fn<Processor>();
    const { deps, ledger } = await setup(processor);
    const run = ledger.runs.get(1);
    if (run) ledger.runs.set(1, { ...run, fileName: 'missing.csv' });

    const err = await runIngest(1, deps).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FileNotReadableError);
    expect(err).toMatchObject({ code: 'E1001', statusCode: 404 });
    expect(processor).not.toHaveBeenCalled();
    expect(ledger.runs.get(1)?.status).toBe('failed');
  });

  it('reports a ledger write failure as a system error', async () => {
    class BrokenLedger extends MemoryLedger {
      override async success(): Promise<void> {
        throw new Error('connection reset');
      }
    }
    const { deps, ledger } = await setup(
      async () => ({ resultTable: 'customs_country_stats', count: 1 }),
      { ledger: new BrokenLedger() }
    );

    const err = await runIngest(1, deps).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SystemError);
    expect(ledger.events.at(-1)).toEqual({
      type: 'fail',
      fileSeq: 1,
      remark: 'A system error occurred.',
    });
  });

  it('records a failure when the run cannot be marked as started', async () => {
    class StuckLedger extends MemoryLedger {
      override async start(): Promise<void> {
        throw new Error('statement timeout');
      }
    }
    const processor = vi.fn<Processor>();
    const { deps, ledger, lock } = await setup(processor, { ledger: new StuckLedger() });

    const err = await runIngest(1, deps).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SystemError);
    expect(processor).not.toHaveBeenCalled();
    expect(ledger.events).toEqual([{ type: 'fail', fileSeq: 1, remark: 'A system error occurred.' }]);
    expect(lock.held.size).toBe(0);
  });

  it('rethrows the run failure when the ledger cannot record it', async () => {
    class ReadOnlyLedger extends MemoryLedger {
      override async fail(): Promise<void> {
        throw new Error('read-only transaction');
      }
    }
    const failure = new DataValidationError('Missing required columns: 국가');
    const { deps, lock } = await setup(
      async () => {
        throw failure;
      },
      { ledger: new ReadOnlyLedger() }
    );

    await expect(runIngest(1, deps)).rejects.toBe(failure);
    expect(lock.held.size).toBe(0);
  });

  it('throws RunNotFoundError for an unknown run', async () => {
    const { deps, ledger } = await setup(async () => ({ resultTable: 't', count: 0 }));
    await expect(runIngest(99, deps)).rejects.toBeInstanceOf(RunNotFoundError);
    expect(ledger.events).toEqual([]);
  });

  it('refuses a run that is already locked', async () => {
    const { deps, ledger, lock } = await setup(async () => ({ resultTable: 't', count: 0 }));
    lock.held.add('ingest:1');

    await expect(runIngest(1, deps)).rejects.toBeInstanceOf(RunLockedError);
    expect(ledger.events).toEqual([]);
  });

  it('writes the CSV export when an output dir is configured', async () => {
    const outDir = dirname(await writeTextFile('', 'placeholder.txt'));
    const { deps, ledger } = await setup(
      async () => ({
        resultTable: 'customs_country_stats',
        count: 1,
        csvRows: [{ year: '2024', nation_code: 'DE' }],
      }),
      { config: { ...testConfig, csvOutputDir: outDir } }
    );

    const outcome = await runIngest(1, deps);

    expect(outcome.csvFile).toMatch(/customs_country_stats_\d{14}\.csv$/);
    expect(ledger.runs.get(1)?.csvFile).toBe(outcome.csvFile);
    const content = await readFile(outcome.csvFile ?? '', 'utf8');
    expect(content.split('\n').slice(0, 2)).toEqual(['year,nation_code', '2024,DE']);
  });
});
