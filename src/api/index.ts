// Admission webhook endpoints (Fastify)
export type {
  AdmissionOperation,
  AdmissionResponse,
  AdmissionReviewResponse,
  AdmissionStatus,
  ApiError,
  ApiResponse,
  KubernetesObject,
  RouteDependencies,
} from './types.js';

export { registerErrorHandler, sendError } from './error-handler.js';
export { registerRoutes } from './routes/index.js';
export { createServer } from './server.js';
export type { ServerOptions } from './server.js';
