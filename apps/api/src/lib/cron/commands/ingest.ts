import { IngestJobSchema, IngestStatusSchema, TradeDirectionSchema } from '@statbridge/types';
import { basename, dirname, resolve } from 'node:path';
import { runIngest } from '../../ingest/run-ingest.js';
import { listIngestRuns, registerIngestRun } from '../../ingest/run-ledger.js';
import { createIngestDeps } from '../../../modules/ingest-runs/services/deps.js';
import { type Command, printResult } from '../runtime.js';
import { flagAs, flagBool, flagNum, flagStr, parseFlags, requireFlag } from '../utils.js';

/** ingest:run --seq=N [--direction=export|import] [--replace-all] */
export const ingestRun: Command = async (argv) => {
  const flags = parseFlags(argv);
  const fileSeq = flagNum(flags, 'seq');
  if (fileSeq === undefined || !Number.isInteger(fileSeq) || fileSeq <= 0) {
    throw new Error('ingest:run needs --seq=<positive integer>');
  }

  const direction = flagAs(flags, 'direction', TradeDirectionSchema);
  const overrides = {
    ...(direction ? { direction } : {}),
    ...(flagBool(flags, 'replace-all') ? { replaceAll: true } : {}),
  };

  printResult(await runIngest(fileSeq, createIngestDeps(), overrides));
};

/** ingest:register --job=<job> --file=<path> [--name=<original name>] [--direction=] */
export const ingestRegister: Command = async (argv) => {
  const flags = parseFlags(argv);
  const job = flagAs(flags, 'job', IngestJobSchema);
  if (!job) throw new Error(`ingest:register needs --job=<${IngestJobSchema.options.join('|')}>`);

  const file = resolve(requireFlag(flags, 'file'));
  const direction = flagAs(flags, 'direction', TradeDirectionSchema);

  const run = await registerIngestRun({
    job,
    fileDir: dirname(file),
    fileName: basename(file),
    originalName: flagStr(flags, 'name'),
    params: direction ? { direction } : {},
  });
  printResult(run);
};

/** ingest:list [--page=] [--size=] [--status=] [--job=] */
export const ingestList: Command = async (argv) => {
  const flags = parseFlags(argv);
  printResult(
    await listIngestRuns({
      page: flagNum(flags, 'page') ?? 1,
      size: flagNum(flags, 'size') ?? 20,
      status: flagAs(flags, 'status', IngestStatusSchema),
      job: flagAs(flags, 'job', IngestJobSchema),
    })
  );
};
