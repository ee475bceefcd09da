/**
 * Health route for liveness and readiness probes.
 */
import type { FastifyInstance } from 'fastify';

/** Register the health check route. */
export function healthRoutes(fastify: FastifyInstance): void {
  // GET /health
  fastify.get('/health', () => ({ status: 'ok', timestamp: new Date().toISOString() }));
}
