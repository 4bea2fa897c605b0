import 'dotenv/config';
import { closeDb } from '@statbridge/db';
import { validateApiRuntimeEnv } from './lib/env.js';
import { buildServer } from './server.js';

const env = validateApiRuntimeEnv();

async function start() {
  const app = await buildServer({ logLevel: env.logLevel });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, 'shutting down');
      app
        .close()
        .then(() => closeDb())
        .then(
          () => process.exit(0),
          (err: unknown) => {
            app.log.error({ err }, 'shutdown failed');
            process.exit(1);
          }
        );
    });
  }

  await app.listen({ port: env.port, host: env.host });
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
