import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { parseDateRequestSchema } from '../../application/index.js';
import { DateParseError, isIsoDate, parseDateRange, todayIn } from '../../domain/index.js';

export interface DateRoutesOptions {
  timeZone: string;
  now?: () => Date;
}

/**
 * POST /api/v1/dates/parse — resolve a Japanese date text to an ISO range
 */
async function dateRoutes(fastify: FastifyInstance, opts: DateRoutesOptions): Promise<void> {
  const now = opts.now ?? (() => new Date());

  fastify.post(
    '/api/v1/dates/parse',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = parseDateRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const today = parsed.data.today ?? todayIn(opts.timeZone, now());
      if (!isIsoDate(today)) {
        return reply.status(400).send({ error: 'today must be a valid calendar date' });
      }

      try {
        const range = parseDateRange(parsed.data.text, today);
        return reply.status(200).send({ start: range.start, end: range.end });
      } catch (err: unknown) {
        if (err instanceof DateParseError) {
          return reply.status(400).send({ error: err.message, text: err.text });
        }
        throw err;
      }
    },
  );
}

export default fp(dateRoutes, {
  name: 'date-routes',
  fastify: '5.x',
});
