import Fastify from 'fastify';
import sensible from '@fastify/sensible';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import type { IngestDeps } from './lib/ingest/types.js';
import { loggerOptions } from './lib/logger.js';
import healthRoutes from './modules/health/routes.js';
import ingestRunRoutes from './modules/ingest-runs/routes.js';
import metricsRoutes from './modules/metrics/routes.js';
import errorHandler from './plugins/error-handler.js';

export type BuildServerOptions = {
  logLevel?: string;
  /** Replaces the PostgreSQL-backed ingest collaborators (tests). */
  ingestDeps?: IngestDeps;
};

export async function buildServer(opts: BuildServerOptions = {}) {
  const app = Fastify({
    logger: loggerOptions(opts.logLevel),
    bodyLimit: 2 * 1024 * 1024,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  await app.register(sensible);
  await app.register(errorHandler);

  await app.register(healthRoutes); // /healthz
  await app.register(metricsRoutes); // /metrics

  // --------------
  // Admin surfaces
  // --------------
  await app.register(ingestRunRoutes, {
    prefix: '/v1/admin/ingest-runs',
    deps: opts.ingestDeps,
  });

  return app;
}
