/**
 * Kubernetes-backed SecretObjectRepository over the core/v1 Secret API.
 * Secret data is base64 on the wire and Buffers everywhere else.
 */
import type { V1Secret } from '@kubernetes/client-node';
import { abortable } from '../../core/abort.js';
import { SecretObjectNotFoundError } from '../../secrets/errors.js';
import type {
  CallOptions,
  KeyValues,
  ObjectKey,
  SecretObject,
  SecretObjectRepository,
} from '../../secrets/types.js';
import { withPatchingApply } from './patching-apply.js';

/** The subset of CoreV1Api this repository calls. */
export interface SecretsApi {
  readNamespacedSecret(param: { name: string; namespace: string }): Promise<V1Secret>;
  createNamespacedSecret(param: { namespace: string; body: V1Secret }): Promise<V1Secret>;
  replaceNamespacedSecret(param: {
    name: string;
    namespace: string;
    body: V1Secret;
  }): Promise<V1Secret>;
  deleteNamespacedSecret(param: { name: string; namespace: string }): Promise<unknown>;
}

/** Secret type the API server assigns when none is given. */
const OPAQUE_SECRET_TYPE = 'Opaque';

/** HTTP status carried by an API exception, if any. */
function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    if (typeof code === 'number') return code;
  }
  return undefined;
}

function decodeData(data: Record<string, string> | undefined): KeyValues {
  return Object.fromEntries(
    Object.entries(data ?? {}).map(([key, value]) => [key, Buffer.from(value, 'base64')]),
  );
}

function encodeData(data: KeyValues): Record<string, string> {
  return Object.fromEntries(
    Object.entries(data).map(([key, value]) => [key, value.toString('base64')]),
  );
}

/** Map an API Secret to a SecretObject. */
export function fromV1Secret(secret: V1Secret, key: ObjectKey): SecretObject {
  const object: SecretObject = {
    name: secret.metadata?.name ?? key.name,
    namespace: secret.metadata?.namespace ?? key.namespace,
    type: secret.type ?? OPAQUE_SECRET_TYPE,
    labels: { ...secret.metadata?.labels },
    annotations: { ...secret.metadata?.annotations },
    data: decodeData(secret.data),
  };
  const resourceVersion = secret.metadata?.resourceVersion;
  if (resourceVersion !== undefined) object.resourceVersion = resourceVersion;
  return object;
}

/** Map a SecretObject to the API Secret shape. */
export function toV1Secret(object: SecretObject): V1Secret {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: {
      name: object.name,
      namespace: object.namespace,
      labels: object.labels,
      annotations: object.annotations,
      ...(object.resourceVersion !== undefined && { resourceVersion: object.resourceVersion }),
    },
    type: object.type,
    data: encodeData(object.data),
  };
}

/**
 * Create a SecretObjectRepository that talks to the Kubernetes API.
 * A 404 becomes SecretObjectNotFoundError; every other API error is rethrown as-is.
 */
export function createKubernetesSecretRepository(api: SecretsApi): SecretObjectRepository {
  function notFoundOr(key: ObjectKey, error: unknown): unknown {
    return statusCodeOf(error) === 404 ? new SecretObjectNotFoundError(key, error) : error;
  }

  return withPatchingApply({
    async get(key: ObjectKey, options?: CallOptions): Promise<SecretObject> {
      try {
        const secret = await abortable(
          'get',
          () => api.readNamespacedSecret({ name: key.name, namespace: key.namespace }),
          options?.abortSignal,
        );
        return fromV1Secret(secret, key);
      } catch (error) {
        throw notFoundOr(key, error);
      }
    },

    async create(object: SecretObject, options?: CallOptions): Promise<void> {
      await abortable(
        'create',
        () =>
          api.createNamespacedSecret({
            namespace: object.namespace,
            body: toV1Secret({ ...object, resourceVersion: undefined }),
          }),
        options?.abortSignal,
      );
    },

    async update(object: SecretObject, options?: CallOptions): Promise<void> {
      try {
        await abortable(
          'update',
          () =>
            api.replaceNamespacedSecret({
              name: object.name,
              namespace: object.namespace,
              body: toV1Secret(object),
            }),
          options?.abortSignal,
        );
      } catch (error) {
        throw notFoundOr(object, error);
      }
    },

    async delete(object: SecretObject, options?: CallOptions): Promise<void> {
      try {
        await abortable(
          'delete',
          () => api.deleteNamespacedSecret({ name: object.name, namespace: object.namespace }),
          options?.abortSignal,
        );
      } catch (error) {
        throw notFoundOr(object, error);
      }
    },
  });
}
