import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import {
  ErrorResponseSchema,
  IngestProcessBodySchema,
  IngestProcessResponseSchema,
  IngestRunIdParamSchema,
  IngestRunListQuerySchema,
  IngestRunListResponseSchema,
  IngestRunRegisterBodySchema,
  IngestRunSelectSchema,
  SweepStaleBodySchema,
  SweepStaleResponseSchema,
} from '@statbridge/types';
import { RunNotFoundError } from '../../lib/errors.js';
import { runIngest } from '../../lib/ingest/run-ingest.js';
import {
  deleteIngestRun,
  getIngestRun,
  listIngestRuns,
  registerIngestRun,
} from '../../lib/ingest/run-ledger.js';
import { sweepStaleRuns } from '../../lib/ingest/sweep-stale-runs.js';
import type { IngestDeps } from '../../lib/ingest/types.js';
import { createIngestDeps } from './services/deps.js';

export type IngestRunRoutesOptions = {
  /** Collaborators for processing; defaults to the PostgreSQL-backed set. */
  deps?: IngestDeps;
};

export default async function ingestRunRoutes(
  app: FastifyInstance,
  opts: IngestRunRoutesOptions
) {
  const r = app.withTypeProvider<ZodTypeProvider>();
  const deps = opts.deps ?? createIngestDeps();

  // LIST (paged, filterable)
  r.get(
    '/',
    {
      schema: {
        querystring: IngestRunListQuerySchema,
        response: { 200: IngestRunListResponseSchema },
      },
    },
    async (req) => listIngestRuns(req.query)
  );

  // REGISTER a file already on disk
  r.post(
    '/',
    {
      schema: {
        body: IngestRunRegisterBodySchema,
        response: { 201: IngestRunSelectSchema },
      },
    },
    async (req, reply) => {
      const run = await registerIngestRun(req.body);
      req.log.info({ fileSeq: run.fileSeq, job: run.job }, 'ingest run registered');
      return reply.code(201).send(run);
    }
  );

  r.post(
    '/sweep-stale',
    {
      schema: {
        body: SweepStaleBodySchema.optional(),
        response: { 200: SweepStaleResponseSchema },
      },
    },
    async (req) =>
      sweepStaleRuns({
        thresholdMinutes: req.body?.thresholdMinutes ?? deps.config.staleMinutes,
        limit: req.body?.limit,
      })
  );

  r.get(
    '/:fileSeq',
    {
      schema: {
        params: IngestRunIdParamSchema,
        response: { 200: IngestRunSelectSchema, 404: ErrorResponseSchema },
      },
    },
    async (req) => {
      const run = await getIngestRun(req.params.fileSeq);
      if (!run) throw new RunNotFoundError(req.params.fileSeq);
      return run;
    }
  );

  r.delete(
    '/:fileSeq',
    {
      schema: {
        params: IngestRunIdParamSchema,
        response: { 404: ErrorResponseSchema },
      },
    },
    async (req, reply) => {
      const removed = await deleteIngestRun(req.params.fileSeq);
      if (!removed) throw new RunNotFoundError(req.params.fileSeq);
      return reply.code(204).send();
    }
  );

  // PROCESS: dispatch by the run's job; body overrides the registered params
  r.post(
    '/:fileSeq/process',
    {
      schema: {
        params: IngestRunIdParamSchema,
        body: IngestProcessBodySchema.optional(),
        response: {
          200: IngestProcessResponseSchema,
          404: ErrorResponseSchema,
          409: ErrorResponseSchema,
          422: ErrorResponseSchema,
          500: ErrorResponseSchema,
        },
      },
    },
    async (req) => runIngest(req.params.fileSeq, deps, req.body ?? {})
  );
}
