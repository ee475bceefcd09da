/**
 * Upsert on top of plain get/create/update calls.
 * The read-modify-write relies on the backend rejecting a stale
 * resourceVersion; conflicts surface to the caller unchanged.
 */
import { isNotFound } from '../../secrets/errors.js';
import { secretObjectsEqual } from '../../secrets/key-values.js';
import type {
  ApplyOptions,
  SecretObject,
  SecretObjectClient,
  SecretObjectRepository,
} from '../../secrets/types.js';

/**
 * Give a client an `apply` that creates missing objects and merges into
 * existing ones, skipping the update when nothing would change.
 */
export function withPatchingApply(client: SecretObjectClient): SecretObjectRepository {
  return {
    get: (key, options) => client.get(key, options),
    create: (object, options) => client.create(object, options),
    update: (object, options) => client.update(object, options),
    delete: (object, options) => client.delete(object, options),

    async apply(object: SecretObject, options?: ApplyOptions): Promise<void> {
      const callOptions = { abortSignal: options?.abortSignal };

      let current: SecretObject;
      try {
        current = await client.get(object, callOptions);
      } catch (error) {
        if (!isNotFound(error)) throw error;
        await client.create(object, callOptions);
        return;
      }

      const next = options?.merge
        ? options.merge(current, object)
        : { ...object, resourceVersion: current.resourceVersion };
      if (secretObjectsEqual(current, next)) return;

      await client.update(next, callOptions);
    },
  };
}
