import type { Command } from './runtime.js';
import { ingestList, ingestRegister, ingestRun } from './commands/ingest.js';
import { referenceLoad } from './commands/reference-load.js';
import { runSweepStale } from './commands/sweep-stale.js';

export const commands: Record<string, Command> = {
  'ingest:list': ingestList,
  'ingest:register': ingestRegister,
  'ingest:run': ingestRun,
  'ingest:sweep-stale': runSweepStale,

  'reference:load': referenceLoad,
};
