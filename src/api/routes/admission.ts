/**
 * Admission routes: runs the validation chains behind a Kubernetes
 * validating admission webhook.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { StowageError, ValidationError } from '../../core/errors.js';
import type { ValidationContext } from '../../validation/types.js';
import type {
  AdmissionResponse,
  AdmissionReviewResponse,
  KubernetesObject,
  RouteDependencies,
} from '../types.js';

// ─── Zod Schemas ────────────────────────────────────────────────

const kubernetesObjectSchema = z.record(z.unknown());

const admissionReviewSchema = z.object({
  apiVersion: z.literal('admission.k8s.io/v1'),
  kind: z.literal('AdmissionReview'),
  request: z.object({
    uid: z.string().min(1),
    operation: z.enum(['CREATE', 'UPDATE', 'DELETE', 'CONNECT']),
    object: kubernetesObjectSchema.nullish(),
    oldObject: kubernetesObjectSchema.nullish(),
  }),
});

type AdmissionRequest = z.infer<typeof admissionReviewSchema>['request'];

const DENIED_STATUS_CODE = 403;

// ─── Helpers ────────────────────────────────────────────────────

function requireObject(
  value: KubernetesObject | null | undefined,
  field: 'object' | 'oldObject',
  request: AdmissionRequest,
): KubernetesObject {
  if (!value) {
    throw new ValidationError(`request.${field} is required for ${request.operation}`, {
      uid: request.uid,
      operation: request.operation,
    });
  }
  return value;
}

function toReview(response: AdmissionResponse): AdmissionReviewResponse {
  return { apiVersion: 'admission.k8s.io/v1', kind: 'AdmissionReview', response };
}

/** Map a rejection from a validation callback to an admission status. */
function deniedStatus(error: unknown): { code: number; message: string } {
  if (error instanceof StowageError) {
    return { code: error.statusCode, message: error.message };
  }
  return {
    code: DENIED_STATUS_CODE,
    message: error instanceof Error ? error.message : String(error),
  };
}

// ─── Route Plugin ───────────────────────────────────────────────

/** Register the admission webhook route. */
export function admissionRoutes(fastify: FastifyInstance, deps: RouteDependencies): void {
  const { validator, logger } = deps;

  // POST /validate
  fastify.post('/validate', async (request, reply) => {
    const review = admissionReviewSchema.parse(request.body);
    const admission = review.request;

    // Resolve the objects up front so a malformed review is a 400, not a denial.
    let run: (ctx: ValidationContext) => Promise<void>;
    switch (admission.operation) {
      case 'CREATE': {
        const obj = requireObject(admission.object, 'object', admission);
        run = (ctx) => validator.validateCreate(ctx, obj);
        break;
      }
      case 'UPDATE': {
        const oldObj = requireObject(admission.oldObject, 'oldObject', admission);
        const newObj = requireObject(admission.object, 'object', admission);
        run = (ctx) => validator.validateUpdate(ctx, oldObj, newObj);
        break;
      }
      case 'DELETE': {
        const obj = requireObject(admission.oldObject, 'oldObject', admission);
        run = (ctx) => validator.validateDelete(ctx, obj);
        break;
      }
      case 'CONNECT':
        run = () => Promise.resolve();
        break;
    }

    const ctx: ValidationContext = {
      logger: logger.child({ uid: admission.uid, operation: admission.operation }),
    };

    try {
      await run(ctx);
    } catch (error) {
      const status = deniedStatus(error);
      logger.info('Admission denied', {
        component: 'admission',
        uid: admission.uid,
        operation: admission.operation,
        code: status.code,
        reason: status.message,
      });
      return reply.send(toReview({ uid: admission.uid, allowed: false, status }));
    }

    logger.debug('Admission allowed', {
      component: 'admission',
      uid: admission.uid,
      operation: admission.operation,
    });
    return reply.send(toReview({ uid: admission.uid, allowed: true }));
  });
}
