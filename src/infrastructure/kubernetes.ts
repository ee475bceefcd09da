/**
 * Kubernetes API client construction from a kubeconfig.
 */
import { CoreV1Api, KubeConfig } from '@kubernetes/client-node';
import { createLogger } from '../observability/logger.js';
import type { SecretsApi } from './repositories/kubernetes-secret-repository.js';

const logger = createLogger({ name: 'kubernetes' });

/** Options for building the Kubernetes client. */
export interface KubernetesClientOptions {
  /** Path to a kubeconfig file. Defaults to KUBECONFIG, ~/.kube/config, then in-cluster. */
  kubeconfigPath?: string;
  /** Context to select from the kubeconfig. */
  context?: string;
}

/** Load a KubeConfig following the given options. */
export function loadKubeConfig(options?: KubernetesClientOptions): KubeConfig {
  const kubeConfig = new KubeConfig();
  if (options?.kubeconfigPath) {
    kubeConfig.loadFromFile(options.kubeconfigPath);
  } else {
    kubeConfig.loadFromDefault();
  }
  if (options?.context) {
    kubeConfig.setCurrentContext(options.context);
  }
  return kubeConfig;
}

/** Create the core/v1 API client used by the Kubernetes secret repository. */
export function createKubernetesClient(options?: KubernetesClientOptions): SecretsApi {
  const kubeConfig = loadKubeConfig(options);
  logger.info('Kubernetes client configured', {
    component: 'kubernetes',
    context: kubeConfig.getCurrentContext(),
    server: kubeConfig.getCurrentCluster()?.server,
  });
  return kubeConfig.makeApiClient(CoreV1Api);
}
