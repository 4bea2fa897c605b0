import type { FastifyInstance } from 'fastify';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { HealthSchema } from '@statbridge/types';
import { checkHealth } from './services.js';

export default async function healthRoutes(app: FastifyInstance) {
  const r = app.withTypeProvider<ZodTypeProvider>();

  r.get(
    '/healthz',
    { schema: { response: { 200: HealthSchema, 503: HealthSchema } } },
    async (_req, reply) => {
      const report = await checkHealth();
      reply.header('cache-control', 'no-store');
      return reply.code(report.ok ? 200 : 503).send(report);
    }
  );

  r.head('/healthz', async (_req, reply) => {
    const report = await checkHealth();
    reply.header('cache-control', 'no-store');
    return reply.code(report.ok ? 200 : 503).send();
  });
}
