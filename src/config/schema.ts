/**
 * Zod schemas for validating secret store configuration files.
 */
import { z } from 'zod';

// ─── Kubernetes Backend ─────────────────────────────────────────

/**
 * Schema for reaching the Kubernetes API.
 * Both fields fall back to the default kubeconfig loading rules.
 */
export const kubernetesBackendConfigSchema = z.object({
  kubeconfigPath: z.string().min(1, 'kubeconfigPath cannot be empty').optional(),
  context: z.string().min(1, 'context cannot be empty').optional(),
});

// ─── Secret Store ───────────────────────────────────────────────

// DNS-1123 label, the rule Kubernetes applies to namespace names.
const NAMESPACE_PATTERN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;

export const secretStoreTypeSchema = z.enum(['Kubernetes', 'InMemory']);

/**
 * Schema for a secret store: which backend, and where secrets without a
 * scope are written.
 */
export const secretStoreConfigSchema = z.object({
  type: secretStoreTypeSchema.default('Kubernetes'),
  defaultScope: z
    .string()
    .min(1, 'defaultScope cannot be empty')
    .max(63, 'defaultScope cannot exceed 63 characters')
    .regex(NAMESPACE_PATTERN, 'defaultScope must be a valid namespace name'),
  defaultSecretType: z.string().min(1).optional(),
  kubernetes: kubernetesBackendConfigSchema.optional(),
});
