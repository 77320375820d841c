import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { ValidationError } from '../../domain/index.js';
import { ingestWebhook, createTestEvent, testEventSchema } from '../../application/index.js';

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Webhook ingestion routes.
 *
 * POST /api/webhook      : GitHub webhook entry point (X-GitHub-Event)
 * POST /api/webhook/test : persist one event from body fields, no parsing
 */
async function webhookRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/webhook',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const outcome = await ingestWebhook(
        { store: fastify.eventStore, log: request.log },
        {
          eventType: headerValue(request.headers['x-github-event']),
          payload: request.body,
        },
      );

      switch (outcome.status) {
        case 'success':
          return reply.status(200).send({
            status: 'success',
            message: 'Event processed successfully',
            event_id: outcome.eventId,
          });
        case 'ignored':
          return reply.status(200).send({ status: 'ignored', message: outcome.message });
        case 'rejected':
          return reply.status(400).send({ error: outcome.error });
        case 'failed':
          return reply.status(500).send({ error: outcome.error });
      }
    },
  );

  fastify.post(
    '/api/webhook/test',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = testEventSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          details: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }

      try {
        const eventId = await createTestEvent(fastify.eventStore, parsed.data);
        request.log.info({ event_id: eventId }, 'Test event created');
        return reply.status(200).send({
          status: 'success',
          message: 'Test event created successfully',
          event_id: eventId,
        });
      } catch (err: unknown) {
        if (err instanceof ValidationError) {
          return reply.status(400).send({ error: err.message });
        }
        request.log.error({ err }, 'Failed to save test event');
        return reply.status(500).send({ error: 'Failed to save test event' });
      }
    },
  );
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['event-store'],
  fastify: '5.x',
});
