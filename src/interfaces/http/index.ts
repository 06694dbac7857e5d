import type { FastifyInstance } from 'fastify';
import ingestRoutes from './ingest-routes.js';
import queryRoutes from './query-routes.js';
import healthRoutes from './health-routes.js';

export { default as pipelinePlugin } from './pipeline-plugin.js';
export type { PipelineOptions, HealthCheck } from './pipeline-plugin.js';
export { ingestRoutes, queryRoutes, healthRoutes };

/** Registers every HTTP route. Requires `pipelinePlugin` to be registered first. */
export async function registerRoutes(fastify: FastifyInstance): Promise<void> {
  await fastify.register(ingestRoutes);
  await fastify.register(queryRoutes);
  await fastify.register(healthRoutes);
}
