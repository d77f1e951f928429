import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { logEventRequestSchema } from '../../application/index.js';

/**
 * Registers the telemetry routes.
 *
 * POST /api/v1/events: enqueue a custom event (202, no delivery guarantee)
 * POST /api/v1/flush : deliver pending events now, report the backlog
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = logEventRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { user, eventName, value, metadata } = parsed.data;
      await fastify.flags.logEvent(user, eventName, value, metadata);

      return reply.status(202).send({ status: 'accepted' });
    },
  );

  /**
   * Explicit flush. Resolves once every batch has been attempted;
   * `remaining` is the number of events that could not be delivered.
   */
  fastify.post(
    '/api/v1/flush',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const remaining = await fastify.flags.flush();
      return reply.status(200).send({ remaining });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['flag-client'],
  fastify: '5.x',
});
