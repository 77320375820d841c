import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listEvents, getEvent, createSampleEvents } from '../../application/index.js';

/**
 * Parses a querystring value to an integer.
 * Missing, blank or non-integer values yield `undefined` (use the default).
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n !== Math.floor(n)) return undefined;
  return n;
}

/**
 * Read API routes.
 *
 * GET  /api/events         : latest events, formatted (limit ≤ 100)
 * GET  /api/events/:id     : single event by id
 * POST /api/events/sample  : reset the store to three sample events
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/events',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      const result = await listEvents(fastify.eventStore, {
        limit: safeInt(request.query.limit),
      });
      return reply.status(200).send(result);
    },
  );

  fastify.get(
    '/api/events/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const result = await getEvent(fastify.eventStore, request.params.id);

      if (result === null) {
        return reply.status(404).send({ error: 'Event not found' });
      }

      return reply.status(200).send(result);
    },
  );

  fastify.post(
    '/api/events/sample',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { eventIds } = await createSampleEvents(fastify.eventStore, request.log);
      return reply.status(200).send({
        status: 'success',
        message: `Created ${eventIds.length} sample events`,
        event_ids: eventIds,
      });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
