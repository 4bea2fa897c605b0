import { loadIngestConfig } from '../../env.js';
import { sweepStaleRuns } from '../../ingest/sweep-stale-runs.js';
import { type Command, printResult } from '../runtime.js';
import { flagNum, parseFlags } from '../utils.js';

export const runSweepStale: Command = async (argv) => {
  const flags = parseFlags(argv);
  const thresholdMinutes = flagNum(flags, 'threshold') ?? loadIngestConfig().staleMinutes;
  const limit = flagNum(flags, 'limit');

  printResult(await sweepStaleRuns({ thresholdMinutes, limit }));
};
