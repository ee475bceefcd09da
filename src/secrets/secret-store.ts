/**
 * SecretStore: KeyValues-level read/write/delete over a SecretObjectRepository.
 * Writes merge additively, partial deletes subtract, and a missing secret
 * counts as already deleted.
 */
import type { Logger } from '../observability/logger.js';
import {
  ApplySecretError,
  DeleteSecretError,
  GetSecretError,
  UpdateSecretError,
  isNotFound,
} from './errors.js';
import { mergeKeyValues, withoutKeys } from './key-values.js';
import { parseSecretMetadata } from './metadata.js';
import type {
  CallOptions,
  KeyValues,
  MergeFn,
  ObjectKey,
  Secret,
  SecretObject,
  SecretObjectRepository,
  SecretStore,
} from './types.js';

/** Type given to secrets written without a `type` in their metadata. */
export const DEFAULT_SECRET_TYPE = 'connection.stowage.io/v1alpha1';

export interface SecretStoreDeps {
  repository: SecretObjectRepository;
  /** Namespace used when a Secret carries no scope. */
  defaultScope: string;
  /** Overrides DEFAULT_SECRET_TYPE. */
  defaultSecretType?: string;
  logger: Logger;
}

/**
 * Stored data is overlaid with the desired data; every other field comes
 * from the desired object as-is.
 */
const mergeData: MergeFn = (current, desired) => ({
  ...desired,
  data: mergeKeyValues(current.data, desired.data),
  resourceVersion: current.resourceVersion,
});

/**
 * Create a SecretStore backed by the given repository.
 */
export function createSecretStore(deps: SecretStoreDeps): SecretStore {
  const { repository, defaultScope, logger } = deps;
  const defaultSecretType = deps.defaultSecretType ?? DEFAULT_SECRET_TYPE;

  function keyFor(secret: Secret): ObjectKey {
    return {
      name: secret.name,
      namespace: secret.scope !== undefined && secret.scope !== '' ? secret.scope : defaultScope,
    };
  }

  return {
    async readKeyValues(secret: Secret, options?: CallOptions): Promise<KeyValues> {
      const key = keyFor(secret);
      try {
        const object = await repository.get(key, options);
        return object.data;
      } catch (error) {
        throw new GetSecretError(key, error);
      }
    },

    async writeKeyValues(secret: Secret, kv: KeyValues, options?: CallOptions): Promise<void> {
      const metadata = parseSecretMetadata(secret.metadata);
      const key = keyFor(secret);

      const desired: SecretObject = {
        ...key,
        type: metadata.type ?? defaultSecretType,
        labels: metadata.labels ?? {},
        annotations: metadata.annotations ?? {},
        data: kv,
      };

      try {
        await repository.apply(desired, { merge: mergeData, abortSignal: options?.abortSignal });
      } catch (error) {
        throw new ApplySecretError(key, error);
      }

      logger.debug('Secret applied', {
        component: 'secret-store',
        operation: 'write',
        ...key,
        keys: Object.keys(kv),
      });
    },

    async deleteKeyValues(
      secret: Secret,
      kv?: KeyValues,
      options?: CallOptions,
    ): Promise<void> {
      const key = keyFor(secret);

      let current: SecretObject;
      try {
        current = await repository.get(key, options);
      } catch (error) {
        if (isNotFound(error)) {
          logger.debug('Secret already deleted', {
            component: 'secret-store',
            operation: 'delete',
            ...key,
          });
          return;
        }
        throw new GetSecretError(key, error);
      }

      if (kv === undefined || Object.keys(kv).length === 0) {
        try {
          await repository.delete(current, options);
        } catch (error) {
          throw new DeleteSecretError(key, error);
        }
        logger.debug('Secret deleted', { component: 'secret-store', operation: 'delete', ...key });
        return;
      }

      const remaining: SecretObject = { ...current, data: withoutKeys(current.data, kv) };
      try {
        await repository.update(remaining, options);
      } catch (error) {
        throw new UpdateSecretError(key, error);
      }
      logger.debug('Secret keys removed', {
        component: 'secret-store',
        operation: 'delete',
        ...key,
        keys: Object.keys(kv),
      });
    },
  };
}
