import type { FastifyInstance } from 'fastify';

import type { ApiDeps } from '../http';

export async function healthRoutes(app: FastifyInstance, deps: ApiDeps): Promise<void> {
  app.get('/health', async (_req, reply) => {
    const { healthy, ...report } = await deps.search.health();
    return reply.status(healthy ? 200 : 503).send(report);
  });

  // Liveness only: answers while the event loop does
  app.get('/livez', async (_req, reply) => {
    return reply.send({ alive: true, timestamp: new Date().toISOString() });
  });
}
