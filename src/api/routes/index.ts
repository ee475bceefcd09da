/**
 * Route registration: wires every API route onto the Fastify instance.
 */
import type { FastifyInstance } from 'fastify';
import type { RouteDependencies } from '../types.js';
import { admissionRoutes } from './admission.js';
import { healthRoutes } from './health.js';

/** Register all API routes on the Fastify instance. */
export function registerRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  healthRoutes(fastify);
  admissionRoutes(fastify, deps);
}
