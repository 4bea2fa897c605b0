import type { FastifyInstance } from 'fastify';
import { registry } from '../../lib/metrics.js';

export default async function metricsRoutes(app: FastifyInstance) {
  // Prometheus scrape
  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('content-type', registry.contentType).header('cache-control', 'no-store');
    return reply.send(body);
  });
}
