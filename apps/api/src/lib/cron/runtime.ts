import { logger } from '../logger.js';

export type Command = (args: string[]) => Promise<void>;

/** Commands print their result as JSON on stdout; progress goes to the logger. */
export function printResult(payload: unknown) {
  console.log(JSON.stringify(payload, null, 2));
}

export const cliLogger = logger.child({ component: 'cli' });
