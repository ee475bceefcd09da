/**
 * Types for the namespaced key-value secret store.
 * A secret is a bundle of byte values under one (name, scope) pair; the
 * store owns merge/diff policy while the repository owns persistence.
 */

// ─── Domain Types ────────────────────────────────────────────────

/** Key-value payload exchanged with the store. Keys are unique, order is irrelevant. */
export type KeyValues = Record<string, Buffer>;

/** Logical reference to a stored secret. */
export interface Secret {
  name: string;
  /** Backend namespace. Absent or empty resolves to the store's default scope. */
  scope?: string;
  /**
   * JSON side-channel document with optional `labels`, `annotations` and `type`.
   * Only read on write; never returned.
   */
  metadata?: Buffer;
}

/** Parsed form of `Secret.metadata`. */
export interface SecretMetadata {
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  type?: string;
}

/** Per-call options passed through to the backend. */
export interface CallOptions {
  /**
   * Stops waiting for the backend: the call rejects as soon as the signal
   * fires. The request already sent is not withdrawn, so an aborted write
   * or delete may still have been applied.
   */
  abortSignal?: AbortSignal;
}

// ─── Backend Object ──────────────────────────────────────────────

/** Identity of a backend object. */
export interface ObjectKey {
  name: string;
  namespace: string;
}

/** Structured record as held by the backend repository. */
export interface SecretObject extends ObjectKey {
  type: string;
  labels: Record<string, string>;
  annotations: Record<string, string>;
  data: KeyValues;
  /** Optimistic-concurrency token; set on objects read from the backend. */
  resourceVersion?: string;
}

/** Combines the stored object with the desired one during an apply. */
export type MergeFn = (current: SecretObject, desired: SecretObject) => SecretObject;

export interface ApplyOptions extends CallOptions {
  /** Merge policy used when the object already exists. Defaults to replacing it. */
  merge?: MergeFn;
}

// ─── Repository Interface ────────────────────────────────────────

/** Primitive get/create/update/delete calls against the backend. */
export interface SecretObjectClient {
  /** Fetch an object. Rejects with SecretObjectNotFoundError when it does not exist. */
  get(key: ObjectKey, options?: CallOptions): Promise<SecretObject>;

  /** Create an object. Rejects if it already exists. */
  create(object: SecretObject, options?: CallOptions): Promise<void>;

  /** Replace an existing object; a stale resourceVersion is rejected by the backend. */
  update(object: SecretObject, options?: CallOptions): Promise<void>;

  /** Delete an object. */
  delete(object: SecretObject, options?: CallOptions): Promise<void>;
}

/** Client plus an upsert that applies a caller-chosen merge policy. */
export interface SecretObjectRepository extends SecretObjectClient {
  /**
   * Create the object if absent, otherwise merge it into the stored one and
   * update. Does nothing when the merge leaves the stored object unchanged.
   */
  apply(object: SecretObject, options?: ApplyOptions): Promise<void>;
}

// ─── Store Interface ─────────────────────────────────────────────

/**
 * KeyValues access to connection secrets. An aborted call rejects, but a
 * mutation it had already sent may still land; read back to find out.
 */
export interface SecretStore {
  /** Return the full stored data. Any backend failure, not-found included, rejects with GetSecretError. */
  readKeyValues(secret: Secret, options?: CallOptions): Promise<KeyValues>;

  /** Add or overwrite the given keys; keys already stored but not supplied are preserved. */
  writeKeyValues(secret: Secret, kv: KeyValues, options?: CallOptions): Promise<void>;

  /**
   * Remove the given keys, or the whole secret when `kv` is empty or omitted.
   * A secret that does not exist counts as already deleted.
   */
  deleteKeyValues(secret: Secret, kv?: KeyValues, options?: CallOptions): Promise<void>;
}
