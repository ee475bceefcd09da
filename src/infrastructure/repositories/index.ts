// Secret object repositories
export { withPatchingApply } from './patching-apply.js';

export { createInMemorySecretRepository } from './in-memory-secret-repository.js';
export type { InMemorySecretRepository } from './in-memory-secret-repository.js';

export {
  createKubernetesSecretRepository,
  fromV1Secret,
  toV1Secret,
} from './kubernetes-secret-repository.js';
export type { SecretsApi } from './kubernetes-secret-repository.js';
