import type { FastifyInstance, FastifyPluginCallback } from 'fastify';
import type { HealthCheckResponse, ReadinessResponse, LivenessResponse } from '../observability/index.js';

interface ServerHealthResponse extends HealthCheckResponse {
  connectedClients: number;
  activeTransfers: number;
}

export const healthRoutes: FastifyPluginCallback = (
  fastify: FastifyInstance,
  _opts,
  done
): void => {
  /**
   * GET /health
   * Component checks plus agent and transfer counts
   */
  fastify.get<{ Reply: ServerHealthResponse }>('/health', async (_request, reply) => {
    const health = await fastify.healthChecks.run();
    const body: ServerHealthResponse = {
      ...health,
      connectedClients: fastify.agents.size,
      activeTransfers: fastify.transfers.activeCount,
    };

    if (health.status === 'unhealthy') {
      return reply.status(503).send(body);
    }

    return reply.send(body);
  });

  /**
   * GET /health/ready
   * Readiness probe
   */
  fastify.get<{ Reply: ReadinessResponse }>('/health/ready', async (_request, reply) => {
    const { ready, checks } = await fastify.healthChecks.isReady();

    if (!ready) {
      return reply.status(503).send({ ready: false, checks });
    }

    return reply.send({ ready: true, checks });
  });

  /**
   * GET /health/live
   * Liveness probe
   */
  fastify.get<{ Reply: LivenessResponse }>('/health/live', async () => {
    return { live: fastify.healthChecks.isLive() };
  });

  done();
};
