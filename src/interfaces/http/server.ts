import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { RelayStatus } from '../../application/relay-status.js';
import healthRoutes from './health-routes.js';

/**
 * Builds the Fastify instance serving the health route. Not listening yet.
 */
export async function buildHealthServer(
  status: RelayStatus,
  logLevel: string,
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: logLevel,
    },
  });

  await fastify.register(healthRoutes, { status });

  return fastify;
}
