import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { AnalyticsReader, ExecutionBoundary } from '../../application/index.js';

/** Named probe reported by `GET /health`; resolves when the dependency is reachable. */
export type HealthCheck = () => Promise<unknown>;

export interface PipelineOptions {
  boundary: ExecutionBoundary;
  analytics: AnalyticsReader;
  healthChecks?: Record<string, HealthCheck>;
}

/**
 * Decorates the instance with the ingestion boundary and the analytics
 * reader. Routes depend on this plugin, never on Redis or Postgres
 * directly, so tests can hand in in-process adapters.
 */
async function pipelinePlugin(fastify: FastifyInstance, opts: PipelineOptions): Promise<void> {
  fastify.decorate('boundary', opts.boundary);
  fastify.decorate('analytics', opts.analytics);
  fastify.decorate('healthChecks', opts.healthChecks ?? {});
}

export default fp(pipelinePlugin, {
  name: 'pipeline',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    boundary: ExecutionBoundary;
    analytics: AnalyticsReader;
    healthChecks: Record<string, HealthCheck>;
  }
}
