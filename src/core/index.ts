// Core module: shared result type and error hierarchy
export type { Result } from './result.js';
export { ok, err } from './result.js';

export { StowageError, ValidationError, AbortedError } from './errors.js';
export { abortable } from './abort.js';
