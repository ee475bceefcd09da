/**
 * Secret store error classes.
 * Each wraps the backend (or decode) failure as `cause` under a fixed message.
 */
import { StowageError } from '../core/errors.js';
import type { ObjectKey } from './types.js';

/** Thrown when fetching a secret fails (read, or the lookup before a delete). */
export class GetSecretError extends StowageError {
  constructor(key: ObjectKey, cause: unknown) {
    super({
      message: 'cannot get secret',
      code: 'GET_SECRET_FAILED',
      statusCode: 502,
      cause,
      context: { name: key.name, namespace: key.namespace },
    });
    this.name = 'GetSecretError';
  }
}

/** Thrown when `Secret.metadata` is not a valid metadata document. */
export class ParseMetadataError extends StowageError {
  constructor(cause: unknown, context?: Record<string, unknown>) {
    super({
      message: 'cannot parse secret metadata',
      code: 'PARSE_METADATA_FAILED',
      statusCode: 400,
      cause,
      context,
    });
    this.name = 'ParseMetadataError';
  }
}

/** Thrown when the upsert during a write fails. */
export class ApplySecretError extends StowageError {
  constructor(key: ObjectKey, cause: unknown) {
    super({
      message: 'cannot apply secret',
      code: 'APPLY_SECRET_FAILED',
      statusCode: 502,
      cause,
      context: { name: key.name, namespace: key.namespace },
    });
    this.name = 'ApplySecretError';
  }
}

/** Thrown when removing the whole secret fails. */
export class DeleteSecretError extends StowageError {
  constructor(key: ObjectKey, cause: unknown) {
    super({
      message: 'cannot delete secret',
      code: 'DELETE_SECRET_FAILED',
      statusCode: 502,
      cause,
      context: { name: key.name, namespace: key.namespace },
    });
    this.name = 'DeleteSecretError';
  }
}

/** Thrown when writing back the remaining keys after a partial delete fails. */
export class UpdateSecretError extends StowageError {
  constructor(key: ObjectKey, cause: unknown) {
    super({
      message: 'cannot update secret',
      code: 'UPDATE_SECRET_FAILED',
      statusCode: 502,
      cause,
      context: { name: key.name, namespace: key.namespace },
    });
    this.name = 'UpdateSecretError';
  }
}

// ─── Repository Errors ───────────────────────────────────────────

/** Raised by repositories when the requested object does not exist. */
export class SecretObjectNotFoundError extends StowageError {
  constructor(key: ObjectKey, cause?: unknown) {
    super({
      message: `Secret "${key.namespace}/${key.name}" not found`,
      code: 'SECRET_NOT_FOUND',
      statusCode: 404,
      cause,
      context: { name: key.name, namespace: key.namespace },
    });
    this.name = 'SecretObjectNotFoundError';
  }
}

/** Raised by repositories when an update carries a stale resourceVersion. */
export class SecretObjectConflictError extends StowageError {
  constructor(key: ObjectKey, expected: string | undefined, actual: string | undefined) {
    super({
      message: `Secret "${key.namespace}/${key.name}" was modified concurrently`,
      code: 'SECRET_CONFLICT',
      statusCode: 409,
      context: {
        name: key.name,
        namespace: key.namespace,
        expectedResourceVersion: expected,
        actualResourceVersion: actual,
      },
    });
    this.name = 'SecretObjectConflictError';
  }
}

/** True when `error` is a repository not-found condition. */
export function isNotFound(error: unknown): error is SecretObjectNotFoundError {
  return error instanceof SecretObjectNotFoundError;
}
