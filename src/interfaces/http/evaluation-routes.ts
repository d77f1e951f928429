import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { checkGateRequestSchema, getConfigRequestSchema } from '../../application/index.js';

/**
 * Registers the evaluation routes.
 *
 * POST /api/v1/gates/check : evaluate a feature gate for a user
 * POST /api/v1/configs/get : evaluate a dynamic config for a user
 *
 * Every successful evaluation records an exposure event.
 */
async function evaluationRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.post(
    '/api/v1/gates/check',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = checkGateRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { user, gate } = parsed.data;
      const value = await fastify.flags.checkGate(user, gate);

      return reply.status(200).send({ gate, value });
    },
  );

  fastify.post(
    '/api/v1/configs/get',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = getConfigRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const { user, config } = parsed.data;
      const result = await fastify.flags.getConfig(user, config);

      return reply.status(200).send({ config, value: result.value, ruleID: result.ruleID });
    },
  );
}

export default fp(evaluationRoutes, {
  name: 'evaluation-routes',
  dependencies: ['flag-client'],
  fastify: '5.x',
});
