import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';

export const API_VERSION = '1.0.0';

export interface HealthRoutesOptions {
  serviceName: string;
}

/**
 * Service metadata routes.
 *
 * GET /api/health : liveness
 * GET /api        : service name, version and endpoint map
 */
async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {
  const { serviceName } = opts;

  fastify.get('/api/health', async (_request, reply: FastifyReply) => {
    return reply.status(200).send({
      status: 'healthy',
      service: serviceName,
      timestamp: new Date().toISOString(),
    });
  });

  fastify.get('/api', async (_request, reply: FastifyReply) => {
    return reply.status(200).send({
      service: serviceName,
      version: API_VERSION,
      endpoints: {
        webhook: '/api/webhook',
        events: '/api/events',
        health: '/api/health',
      },
    });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
