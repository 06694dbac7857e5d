import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { envelopeSchema } from '../../application/index.js';

/**
 * Registers the event ingestion route.
 *
 * POST /ingest: accepts one Spark listener envelope
 */
async function ingestRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Pre-filter → submit → 202 with the tracking handle.
   *
   * Only routability is checked here. Variant-level validation happens
   * in the worker and is reported through the tracking handle.
   */
  fastify.post(
    '/ingest',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = envelopeSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      try {
        const handle = await fastify.boundary.submit(parsed.data);

        fastify.log.debug(
          { handle_id: handle.id, event: parsed.data.event, job_id: parsed.data.job_id },
          'Event submitted',
        );

        return reply.status(202).send({
          status: 'received',
          task_id: handle.id,
        });
      } catch (err: unknown) {
        fastify.log.error({ err, event: parsed.data.event }, 'Failed to submit event');
        return reply.status(503).send({ error: 'Event queue unavailable' });
      }
    },
  );
}

export default fp(ingestRoutes, {
  name: 'ingest-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
