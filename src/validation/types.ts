import type { Logger } from '../observability/logger.js';

// ─── Callbacks ──────────────────────────────────────────────────

/** Per-call context handed to every validation callback. */
export interface ValidationContext {
  abortSignal?: AbortSignal;
  logger?: Logger;
}

/** Rejects (or throws) to refuse the creation of `obj`. */
export type ValidateCreateFn<T> = (ctx: ValidationContext, obj: T) => void | Promise<void>;

/** Rejects (or throws) to refuse replacing `oldObj` with `newObj`. */
export type ValidateUpdateFn<T> = (
  ctx: ValidationContext,
  oldObj: T,
  newObj: T,
) => void | Promise<void>;

/** Rejects (or throws) to refuse the deletion of `obj`. */
export type ValidateDeleteFn<T> = (ctx: ValidationContext, obj: T) => void | Promise<void>;

// ─── Validator ──────────────────────────────────────────────────

export interface ValidationChains<T> {
  readonly creationChain: readonly ValidateCreateFn<T>[];
  readonly updateChain: readonly ValidateUpdateFn<T>[];
  readonly deletionChain: readonly ValidateDeleteFn<T>[];
}

/** Configures a validator under construction. */
export type ValidatorOption<T> = (chains: ValidationChains<T>) => ValidationChains<T>;

/**
 * Runs each chain in order and stops at the first failing callback,
 * whose error propagates unchanged.
 */
export interface Validator<T> extends ValidationChains<T> {
  validateCreate(ctx: ValidationContext, obj: T): Promise<void>;
  validateUpdate(ctx: ValidationContext, oldObj: T, newObj: T): Promise<void>;
  validateDelete(ctx: ValidationContext, obj: T): Promise<void>;
}
