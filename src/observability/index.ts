// Structured logging
export type { LogContext, LogLevel } from './types.js';

export type { Logger } from './logger.js';
export { createLogger, createNoopLogger } from './logger.js';
