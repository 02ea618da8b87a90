import { deepHealthCheck, type HealthProbe } from '@fxconvert/observability';
import type { FastifyInstance } from 'fastify';

export function registerHealthRoutes(app: FastifyInstance, deps: { probes: HealthProbe[] }): void {
  app.get('/healthz', async () => ({ ok: true, service: 'converter-api' }));
  app.get('/readyz', async (_request, reply) => {
    const health = await deepHealthCheck('converter-api', deps.probes);
    const status = health.status === 'unhealthy' ? 503 : 200;
    return reply.status(status).send(health);
  });
}
