// Kubernetes client
export { createKubernetesClient, loadKubeConfig } from './kubernetes.js';
export type { KubernetesClientOptions } from './kubernetes.js';

// Repositories
export {
  withPatchingApply,
  createInMemorySecretRepository,
  createKubernetesSecretRepository,
  fromV1Secret,
  toV1Secret,
} from './repositories/index.js';
export type { InMemorySecretRepository, SecretsApi } from './repositories/index.js';

// Store construction
export { createSecretStoreFromConfig } from './secret-store-factory.js';
export type { SecretStoreFactoryDeps } from './secret-store-factory.js';
