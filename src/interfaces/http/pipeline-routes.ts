import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { processBatch, rawRecordBatchSchema } from '../../application/index.js';
import { todayIn } from '../../domain/index.js';
import { selectSimilarityBackend, VenueTableGeocoder } from '../../infrastructure/index.js';
import type { PipelineConfig } from '../../infrastructure/index.js';

export interface PipelineRoutesOptions {
  config: PipelineConfig;
  /** Clock used to resolve "today" in the configured time zone. */
  now?: () => Date;
}

/**
 * Synchronous pipeline run for small batches.
 *
 * POST /api/v1/pipeline/run — ingest, dedup, validate and schedule in-request
 */
async function pipelineRoutes(fastify: FastifyInstance, opts: PipelineRoutesOptions): Promise<void> {
  const { config } = opts;
  const now = opts.now ?? (() => new Date());
  const geocoder = new VenueTableGeocoder(config.settings.scheduler.venues);
  const backend = selectSimilarityBackend(config.similarityBackend);

  fastify.post(
    '/api/v1/pipeline/run',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = rawRecordBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const outcome = await processBatch(parsed.data, {
        settings: config.settings,
        today: todayIn(config.timeZone, now()),
        log: request.log,
        geocoder,
        backend,
      });

      if (!outcome.result.ok) {
        return reply.status(422).send({
          error: outcome.result.error.message,
          code: outcome.result.error.code,
          failures: outcome.failures,
        });
      }

      return reply.status(200).send({
        report: outcome.result.report,
        events: outcome.result.events,
        conflicts: outcome.result.optimization.remaining,
        failures: outcome.failures,
      });
    },
  );
}

export default fp(pipelineRoutes, {
  name: 'pipeline-routes',
  fastify: '5.x',
});
