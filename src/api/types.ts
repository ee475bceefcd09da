import type { Logger } from '../observability/logger.js';
import type { Validator } from '../validation/types.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Admission ───────────────────────────────────────────────────

/** Any Kubernetes object as carried in an admission request. */
export type KubernetesObject = Record<string, unknown>;

export type AdmissionOperation = 'CREATE' | 'UPDATE' | 'DELETE' | 'CONNECT';

export interface AdmissionStatus {
  code: number;
  message: string;
}

export interface AdmissionResponse {
  uid: string;
  allowed: boolean;
  status?: AdmissionStatus;
}

export interface AdmissionReviewResponse {
  apiVersion: 'admission.k8s.io/v1';
  kind: 'AdmissionReview';
  response: AdmissionResponse;
}

// ─── Route Dependencies ──────────────────────────────────────────

export interface RouteDependencies {
  validator: Validator<KubernetesObject>;
  logger: Logger;
}
