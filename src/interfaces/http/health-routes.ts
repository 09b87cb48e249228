import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /api/v1/health — Redis connectivity check
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        const pong = await fastify.redis.ping();
        return reply.status(200).send({ status: 'ok', redis: pong });
      } catch (err: unknown) {
        fastify.log.error({ err }, 'Redis health check failed');
        return reply.status(503).send({ status: 'degraded', redis: 'unreachable' });
      }
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['redis'],
  fastify: '5.x',
});
