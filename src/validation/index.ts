/**
 * Validation module: ordered validation chains run around resource mutations.
 * @module validation
 */
export type {
  ValidateCreateFn,
  ValidateDeleteFn,
  ValidateUpdateFn,
  ValidationChains,
  ValidationContext,
  Validator,
  ValidatorOption,
} from './types.js';
export {
  createValidator,
  withCreateValidators,
  withDeleteValidators,
  withUpdateValidators,
} from './validator.js';
