// Public entry point for the stowage library
export * from './core/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './secrets/index.js';
export * from './validation/index.js';
export * from './infrastructure/index.js';
export * from './api/index.js';
