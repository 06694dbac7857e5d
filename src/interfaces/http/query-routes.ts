import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { dailySummary, jobSummary } from '../../application/index.js';
import { InvalidDateError } from '../../domain/index.js';

/**
 * Read-only routes.
 *
 * GET /tasks/:task_id  tracking handle status
 * GET /jobs/:job_id    per-job analytics
 * GET /summary?date=   per-day analytics
 */
async function queryRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get(
    '/tasks/:task_id',
    async (
      request: FastifyRequest<{ Params: { task_id: string } }>,
      reply: FastifyReply,
    ) => {
      const { task_id } = request.params;
      const status = await fastify.boundary.poll(task_id);

      if (status === null) {
        return reply.status(404).send({ error: 'Task not found' });
      }

      switch (status.state) {
        case 'pending':
          return reply.status(202).send({ task_id, status: 'processing' });
        case 'succeeded':
          return reply.status(200).send({ task_id, status: 'success', result: status.result });
        case 'failed':
          return reply.status(200).send({
            task_id,
            status: 'failed',
            error: { kind: status.reason, message: status.message },
          });
      }
    },
  );

  fastify.get(
    '/jobs/:job_id',
    async (
      request: FastifyRequest<{ Params: { job_id: string } }>,
      reply: FastifyReply,
    ) => {
      const { job_id } = request.params;
      const result = await jobSummary(fastify.analytics, job_id);

      if (result === null) {
        return reply.status(404).send({ error: 'Job not found' });
      }
      if (result.state === 'pending') {
        return reply.status(202).send({ job_id, status: 'processing' });
      }

      return reply.status(200).send(result.summary);
    },
  );

  fastify.get(
    '/summary',
    async (
      request: FastifyRequest<{ Querystring: { date?: string } }>,
      reply: FastifyReply,
    ) => {
      const { date } = request.query;

      if (date === undefined || date === '') {
        return reply.status(400).send({ error: 'date is required (YYYY-MM-DD)' });
      }

      try {
        const result = await dailySummary(fastify.analytics, date);
        return reply.status(200).send(result);
      } catch (err: unknown) {
        if (err instanceof InvalidDateError) {
          return reply.status(400).send({ error: 'Invalid date format. Use YYYY-MM-DD' });
        }
        throw err;
      }
    },
  );
}

export default fp(queryRoutes, {
  name: 'query-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
