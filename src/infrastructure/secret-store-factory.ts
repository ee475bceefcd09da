/**
 * Builds a SecretStore from a validated store configuration.
 */
import type { StoreConfig } from '../config/types.js';
import type { Logger } from '../observability/logger.js';
import { createSecretStore } from '../secrets/secret-store.js';
import type { SecretObjectRepository, SecretStore } from '../secrets/types.js';
import type { KubernetesClientOptions } from './kubernetes.js';
import { createKubernetesClient } from './kubernetes.js';
import { createInMemorySecretRepository } from './repositories/in-memory-secret-repository.js';
import { createKubernetesSecretRepository } from './repositories/kubernetes-secret-repository.js';
import type { SecretsApi } from './repositories/kubernetes-secret-repository.js';

export interface SecretStoreFactoryDeps {
  logger: Logger;
  /** Replaces the kubeconfig-based client for the Kubernetes backend. */
  createClient?: (options: KubernetesClientOptions) => SecretsApi;
}

function createRepository(
  config: StoreConfig,
  deps: SecretStoreFactoryDeps,
): SecretObjectRepository {
  switch (config.type) {
    case 'Kubernetes': {
      const createClient = deps.createClient ?? createKubernetesClient;
      return createKubernetesSecretRepository(createClient(config.kubernetes ?? {}));
    }
    case 'InMemory':
      return createInMemorySecretRepository();
  }
}

/** Create the SecretStore selected by `config.type`. */
export function createSecretStoreFromConfig(
  config: StoreConfig,
  deps: SecretStoreFactoryDeps,
): SecretStore {
  const repository = createRepository(config, deps);
  deps.logger.info('Secret store created', {
    component: 'secret-store',
    type: config.type,
    defaultScope: config.defaultScope,
  });
  return createSecretStore({
    repository,
    defaultScope: config.defaultScope,
    defaultSecretType: config.defaultSecretType,
    logger: deps.logger,
  });
}
