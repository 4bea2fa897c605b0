import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { hasZodFastifySchemaValidationErrors } from 'fastify-type-provider-zod';
import { errorResponse, errorResponseForStatus, IngestError } from '../lib/errors.js';

function statusOf(err: FastifyError): number {
  const raw = err.statusCode ?? 500;
  return Number.isInteger(raw) && raw >= 400 && raw <= 599 ? raw : 500;
}

const plugin: FastifyPluginAsync = fp(async (app) => {
  app.setErrorHandler((err: FastifyError, req, reply) => {
    if (hasZodFastifySchemaValidationErrors(err)) {
      return reply
        .status(400)
        .send(errorResponse('Request validation failed', 'ERR_VALIDATION', err.validation));
    }

    if (err instanceof IngestError) {
      if (err.statusCode >= 500) req.log.error({ err }, 'ingest_error');
      return reply.status(err.statusCode).send(err.toEnvelope());
    }

    const status = statusOf(err);
    if (status >= 500) {
      req.log.error({ err }, 'request_error');
      return reply.status(500).send(errorResponseForStatus(500, 'Internal Server Error'));
    }
    const message = err.message || 'Bad Request';
    return reply
      .status(status)
      .send(
        typeof err.code === 'string' && err.code.startsWith('ERR_')
          ? errorResponse(message, err.code)
          : errorResponseForStatus(status, message)
      );
  });
});

export default plugin;
