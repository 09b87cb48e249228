import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { rawRecordBatchSchema } from '../../application/index.js';
import { enqueueRawRecords } from '../../infrastructure/redis/index.js';

/**
 * Registers the raw listing ingestion route.
 *
 * POST /api/v1/records/batch — validate a scraped batch and hand it to the worker
 */
async function recordRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Validates the whole array up-front; any schema failure rejects the
   * batch. Accepted records are appended to the stream before replying,
   * so a 202 means the worker will see them.
   */
  fastify.post(
    '/api/v1/records/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = rawRecordBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      try {
        const ids = await enqueueRawRecords(fastify.redis, parsed.data);
        request.log.info({ count: ids.length }, 'Raw records enqueued');
        return reply.status(202).send({
          status: 'accepted',
          count: ids.length,
          ids,
        });
      } catch (err: unknown) {
        request.log.error({ err, count: parsed.data.length }, 'Failed to enqueue raw records');
        return reply.status(503).send({ error: 'Queue unavailable' });
      }
    },
  );
}

export default fp(recordRoutes, {
  name: 'record-routes',
  dependencies: ['redis'],
  fastify: '5.x',
});
