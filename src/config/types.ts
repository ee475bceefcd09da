import type { z } from 'zod';
import type {
  kubernetesBackendConfigSchema,
  secretStoreConfigSchema,
  secretStoreTypeSchema,
} from './schema.js';

/** Validated secret store configuration. */
export type StoreConfig = z.infer<typeof secretStoreConfigSchema>;

/** Backend selected by a StoreConfig. */
export type SecretStoreType = z.infer<typeof secretStoreTypeSchema>;

export type KubernetesBackendConfig = z.infer<typeof kubernetesBackendConfigSchema>;
