/**
 * Secrets module: KeyValues-level access to connection secrets.
 * @module secrets
 */
export type {
  ApplyOptions,
  CallOptions,
  KeyValues,
  MergeFn,
  ObjectKey,
  Secret,
  SecretMetadata,
  SecretObject,
  SecretObjectClient,
  SecretObjectRepository,
  SecretStore,
} from './types.js';
export { createSecretStore, DEFAULT_SECRET_TYPE } from './secret-store.js';
export type { SecretStoreDeps } from './secret-store.js';
export { parseSecretMetadata, secretMetadataSchema } from './metadata.js';
export { mergeKeyValues, withoutKeys, keyValuesEqual, secretObjectsEqual } from './key-values.js';
export {
  ApplySecretError,
  DeleteSecretError,
  GetSecretError,
  ParseMetadataError,
  SecretObjectConflictError,
  SecretObjectNotFoundError,
  UpdateSecretError,
  isNotFound,
} from './errors.js';
