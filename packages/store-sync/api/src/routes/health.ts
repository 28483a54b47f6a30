import type { FastifyInstance, FastifyPluginCallback } from 'fastify';
import { checkHealth, checkReadiness, type HealthReport, type ReadinessReport } from '../observability/index.js';

/**
 * Unauthenticated health endpoints for the load balancer and orchestrator.
 * Both reports answer 503 when a component is unhealthy.
 */
export const healthRoutes: FastifyPluginCallback = (
  fastify: FastifyInstance,
  _opts,
  done
): void => {
  fastify.get<{ Reply: HealthReport }>('/health', async (_request, reply) => {
    const report = await checkHealth();
    return reply.status(report.status === 'unhealthy' ? 503 : 200).send(report);
  });

  fastify.get<{ Reply: ReadinessReport }>('/health/ready', async (_request, reply) => {
    const report = await checkReadiness();
    return reply.status(report.ready ? 200 : 503).send(report);
  });

  // The process answers, nothing more
  fastify.get('/health/live', async () => ({ live: true }));

  done();
};
