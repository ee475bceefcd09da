/**
 * In-memory SecretObjectRepository for tests and local development.
 * Mirrors the backend's optimistic concurrency: every write bumps
 * resourceVersion and updates carrying a stale one are rejected.
 */
import { abortable } from '../../core/abort.js';
import { SecretObjectConflictError, SecretObjectNotFoundError } from '../../secrets/errors.js';
import { cloneKeyValues } from '../../secrets/key-values.js';
import type {
  CallOptions,
  ObjectKey,
  SecretObject,
  SecretObjectRepository,
} from '../../secrets/types.js';
import { withPatchingApply } from './patching-apply.js';

export interface InMemorySecretRepository extends SecretObjectRepository {
  /** Number of stored objects. */
  size(): number;
}

function storageKey(key: ObjectKey): string {
  return `${key.namespace}/${key.name}`;
}

function copyOf(object: SecretObject): SecretObject {
  return {
    ...object,
    labels: { ...object.labels },
    annotations: { ...object.annotations },
    data: cloneKeyValues(object.data),
  };
}

/**
 * Create an empty in-memory repository.
 */
export function createInMemorySecretRepository(): InMemorySecretRepository {
  const objects = new Map<string, SecretObject>();
  let version = 0;

  function nextVersion(): string {
    version += 1;
    return version.toString();
  }

  const repository = withPatchingApply({
    get(key: ObjectKey, options?: CallOptions): Promise<SecretObject> {
      return abortable(
        'get',
        () => {
          const stored = objects.get(storageKey(key));
          if (!stored) return Promise.reject(new SecretObjectNotFoundError(key));
          return Promise.resolve(copyOf(stored));
        },
        options?.abortSignal,
      );
    },

    create(object: SecretObject, options?: CallOptions): Promise<void> {
      return abortable(
        'create',
        () => {
          const id = storageKey(object);
          if (objects.has(id)) {
            return Promise.reject(
              new SecretObjectConflictError(object, undefined, objects.get(id)?.resourceVersion),
            );
          }
          objects.set(id, { ...copyOf(object), resourceVersion: nextVersion() });
          return Promise.resolve();
        },
        options?.abortSignal,
      );
    },

    update(object: SecretObject, options?: CallOptions): Promise<void> {
      return abortable(
        'update',
        () => {
          const id = storageKey(object);
          const stored = objects.get(id);
          if (!stored) return Promise.reject(new SecretObjectNotFoundError(object));
          if (
            object.resourceVersion !== undefined &&
            object.resourceVersion !== stored.resourceVersion
          ) {
            return Promise.reject(
              new SecretObjectConflictError(object, object.resourceVersion, stored.resourceVersion),
            );
          }
          objects.set(id, { ...copyOf(object), resourceVersion: nextVersion() });
          return Promise.resolve();
        },
        options?.abortSignal,
      );
    },

    delete(object: SecretObject, options?: CallOptions): Promise<void> {
      return abortable(
        'delete',
        () => {
          if (!objects.delete(storageKey(object))) {
            return Promise.reject(new SecretObjectNotFoundError(object));
          }
          return Promise.resolve();
        },
        options?.abortSignal,
      );
    },
  });

  return {
    ...repository,
    size: () => objects.size,
  };
}
