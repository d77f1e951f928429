import Fastify from 'fastify';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Coordinator } from '../../application/coordinator.js';
import { CoordinatorStateError } from '../../application/errors.js';
import { flagClientPlugin } from '../../infrastructure/plugins/index.js';
import evaluationRoutes from './evaluation-routes.js';
import eventRoutes from './event-routes.js';
import healthRoutes from './health-routes.js';

export interface BuildServerOptions {
  /** Fastify logger settings; `false` disables request logging. */
  logger: boolean | { level: string };
}

/**
 * Builds the HTTP sidecar around an initialized client.
 *
 * Order:
 * 1) Client plugin (decorates `fastify.flags`, shuts it down on close)
 * 2) Error mapping
 * 3) Routes
 *
 * Does not listen; the caller decides (entry point vs. `inject()` in tests).
 */
export async function buildServer(
  client: Coordinator,
  options: BuildServerOptions,
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: options.logger });

  await fastify.register(flagClientPlugin, { client });

  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      if (error instanceof CoordinatorStateError) {
        return reply.status(503).send({ error: error.message });
      }

      request.log.error({ err: error }, 'Request failed');
      const statusCode = error.statusCode ?? 500;
      return reply.status(statusCode).send({
        error: statusCode >= 500 ? 'Internal Server Error' : error.message,
      });
    },
  );

  await fastify.register(evaluationRoutes);
  await fastify.register(eventRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
