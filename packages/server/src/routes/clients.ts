import type { FastifyInstance, FastifyPluginCallback } from 'fastify';
import type { AgentLiveness, AgentSummary } from '../ws/index.js';

interface ClientResponse {
  client_id: string;
  liveness: AgentLiveness;
  connected_at: string;
  last_seen: string;
}

function clientToResponse(agent: AgentSummary): ClientResponse {
  return {
    client_id: agent.agentId,
    liveness: agent.liveness,
    connected_at: agent.connectedAt.toISOString(),
    last_seen: agent.lastSeen.toISOString(),
  };
}

export const clientRoutes: FastifyPluginCallback = (
  fastify: FastifyInstance,
  _opts,
  done
): void => {
  // List connected agents
  fastify.get('/clients', (_request, reply) => {
    const agents = fastify.agents.list();

    return reply.send({
      count: agents.length,
      clients: agents.map(clientToResponse),
    });
  });

  done();
};
