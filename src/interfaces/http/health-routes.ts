import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /api/v1/health: coordinator phase, sync cursor, backlog and cache size.
 * Answers 503 when the client is not running.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const status = fastify.flags.status();
      const ok = status.phase === 'running';

      return reply.status(ok ? 200 : 503).send({ status: ok ? 'ok' : 'unavailable', ...status });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['flag-client'],
  fastify: '5.x',
});
