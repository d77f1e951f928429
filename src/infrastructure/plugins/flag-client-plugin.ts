import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Coordinator } from '../../application/coordinator.js';

export interface FlagClientPluginOptions {
  client: Coordinator;
}

/**
 * Fastify plugin that exposes an initialized flag client to routes.
 *
 * - Decorates `fastify.flags`.
 * - Shuts the client down (one final flush) when the server closes.
 */
async function flagClientPlugin(
  fastify: FastifyInstance,
  options: FlagClientPluginOptions,
): Promise<void> {
  const { client } = options;

  fastify.decorate('flags', client);

  fastify.addHook('onClose', async () => {
    const dropped = await client.shutdown();
    fastify.log.info({ dropped }, 'Flag client shut down');
  });
}

export default fp(flagClientPlugin, {
  name: 'flag-client',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.flags` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    flags: Coordinator;
  }
}
