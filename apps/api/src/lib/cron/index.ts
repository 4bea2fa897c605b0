import 'dotenv/config';
import { closeDb } from '@statbridge/db';
import { errorMessage } from '../errors.js';
import { commands } from './registry.js';
import { cliLogger as log } from './runtime.js';

async function main(): Promise<number> {
  const [cmd = '', ...args] = process.argv.slice(2);
  const fn = commands[cmd];

  if (!fn) {
    console.log(`Unknown command: ${cmd}\n\nAvailable:\n  ${Object.keys(commands).join('\n  ')}`);
    return 1;
  }

  const started = Date.now();
  log.info({ cmd }, 'command starting');

  try {
    await fn(args);
    log.info({ cmd, ms: Date.now() - started }, 'command finished');
    return 0;
  } catch (err) {
    log.error({ cmd, err }, `command failed: ${errorMessage(err)}`);
    return 1;
  } finally {
    await closeDb();
  }
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(err);
    process.exit(1);
  }
);
