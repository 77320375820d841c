import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyError, FastifyInstance } from 'fastify';
import type { EventStore } from './application/index.js';
import { storePlugin } from './infrastructure/index.js';
import { webhookRoutes, eventRoutes, healthRoutes } from './interfaces/http/index.js';

export interface ServerDeps {
  store: EventStore;
  log: FastifyBaseLogger;
  serviceName: string;
  /** Releases the store's connection when the server closes. */
  closeStore?: (() => Promise<void>) | undefined;
}

/**
 * Builds the Fastify instance without listening.
 *
 * Order:
 * 1) Error + not-found handlers
 * 2) Event store
 * 3) HTTP routes
 */
export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const fastify = Fastify({ loggerInstance: deps.log });

  // Every failure leaves as `{ error }`; 5xx details stay in the log.
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled request error');
      return reply.status(500).send({ error: 'Internal server error' });
    }
    if (error.code === 'FST_ERR_CTP_EMPTY_JSON_BODY') {
      return reply.status(400).send({ error: 'No payload received' });
    }
    return reply.status(statusCode).send({ error: error.message });
  });

  fastify.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({ error: 'Not found' });
  });

  await fastify.register(storePlugin, { store: deps.store, close: deps.closeStore });

  await fastify.register(webhookRoutes);
  await fastify.register(eventRoutes);
  await fastify.register(healthRoutes, { serviceName: deps.serviceName });

  return fastify;
}
