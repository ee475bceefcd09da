/**
 * Validator: ordered create/update/delete validation chains with
 * short-circuit on the first failure.
 */
import type {
  ValidateCreateFn,
  ValidateDeleteFn,
  ValidateUpdateFn,
  ValidationChains,
  ValidationContext,
  Validator,
  ValidatorOption,
} from './types.js';

/** Replace the creation chain with `fns`, in order. */
export function withCreateValidators<T>(...fns: ValidateCreateFn<T>[]): ValidatorOption<T> {
  return (chains) => ({ ...chains, creationChain: fns });
}

/** Replace the update chain with `fns`, in order. */
export function withUpdateValidators<T>(...fns: ValidateUpdateFn<T>[]): ValidatorOption<T> {
  return (chains) => ({ ...chains, updateChain: fns });
}

/** Replace the deletion chain with `fns`, in order. */
export function withDeleteValidators<T>(...fns: ValidateDeleteFn<T>[]): ValidatorOption<T> {
  return (chains) => ({ ...chains, deletionChain: fns });
}

/**
 * Create a Validator. Chains left unconfigured are empty and always pass.
 * The chains are frozen once built.
 */
export function createValidator<T>(...options: ValidatorOption<T>[]): Validator<T> {
  const configured = options.reduce<ValidationChains<T>>((chains, option) => option(chains), {
    creationChain: [],
    updateChain: [],
    deletionChain: [],
  });

  const creationChain = Object.freeze([...configured.creationChain]);
  const updateChain = Object.freeze([...configured.updateChain]);
  const deletionChain = Object.freeze([...configured.deletionChain]);

  return Object.freeze({
    creationChain,
    updateChain,
    deletionChain,

    async validateCreate(ctx: ValidationContext, obj: T): Promise<void> {
      for (const fn of creationChain) {
        await fn(ctx, obj);
      }
    },

    async validateUpdate(ctx: ValidationContext, oldObj: T, newObj: T): Promise<void> {
      for (const fn of updateChain) {
        await fn(ctx, oldObj, newObj);
      }
    },

    async validateDelete(ctx: ValidationContext, obj: T): Promise<void> {
      for (const fn of deletionChain) {
        await fn(ctx, obj);
      }
    },
  });
}
