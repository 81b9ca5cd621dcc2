import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { RelayStatus } from '../../application/relay-status.js';

export interface HealthRoutesOptions {
  status: RelayStatus;
}

/**
 * Health route.
 *
 * GET /health: relay lifecycle snapshot. 200 while a connection is live,
 * 503 while handshaking or after the supervisor has stopped.
 */
async function healthRoutes(fastify: FastifyInstance, opts: HealthRoutesOptions): Promise<void> {

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const snapshot = opts.status.get();
      const code = snapshot.state === 'connected' ? 200 : 503;
      return reply.status(code).send(snapshot);
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
