import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * Health check: runs every registered probe.
 * 200 when all pass, 503 with the failing dependency marked otherwise.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const checks: Record<string, 'ok' | 'unreachable'> = {};

      for (const [name, probe] of Object.entries(fastify.healthChecks)) {
        try {
          await probe();
          checks[name] = 'ok';
        } catch (err: unknown) {
          fastify.log.error({ err, dependency: name }, 'Health check failed');
          checks[name] = 'unreachable';
        }
      }

      const healthy = Object.values(checks).every((v) => v === 'ok');
      return reply.status(healthy ? 200 : 503).send({ status: healthy ? 'ok' : 'degraded', checks });
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['pipeline'],
  fastify: '5.x',
});
