import { createServer as createHttpsServer } from 'node:https';
import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerFactory } from 'fastify';
import type { TlsFiles } from '../config/tls.js';
import { registerErrorHandler } from './error-handler.js';
import { registerRoutes } from './routes/index.js';
import type { RouteDependencies } from './types.js';

export interface ServerOptions {
  /** Serve HTTPS with this certificate; plain HTTP when absent. */
  tls?: TlsFiles;
}

/**
 * Build the admission webhook server. Logging goes through the project
 * logger, so Fastify's own is disabled.
 */
export function createServer(
  deps: RouteDependencies,
  options: ServerOptions = {},
): FastifyInstance {
  const { tls } = options;
  const serverFactory: FastifyServerFactory | undefined = tls
    ? (handler) => createHttpsServer({ cert: tls.cert, key: tls.key }, handler)
    : undefined;

  const server = Fastify({ logger: false, serverFactory });
  registerErrorHandler(server);
  registerRoutes(server, deps);
  return server;
}
