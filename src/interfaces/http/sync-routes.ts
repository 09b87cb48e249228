import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { listSyncRuns } from '../../application/query-sync-runs.js';

/**
 * GET /api/v1/sync/runs — recent worker runs, newest first
 *
 * Query params: limit
 */
async function syncRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/api/v1/sync/runs',
    async (
      request: FastifyRequest<{ Querystring: { limit?: string } }>,
      reply: FastifyReply,
    ) => {
      let limit: number | undefined;
      if (request.query.limit !== undefined) {
        const n = Number(request.query.limit);
        if (!Number.isFinite(n) || n !== Math.floor(n)) {
          return reply.status(400).send({ error: 'limit must be an integer' });
        }
        limit = n;
      }

      const result = await listSyncRuns(fastify.syncDb, { limit });
      return reply.status(200).send(result);
    },
  );
}

export default fp(syncRoutes, {
  name: 'sync-routes',
  dependencies: ['sync-db'],
  fastify: '5.x',
});
