import pino from 'pino';
import type { LogContext, LogLevel } from './types.js';

/** Structured logger interface for Stowage. */
export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  fatal(msg: string, context?: LogContext): void;
  child(bindings: Record<string, unknown>): Logger;
}

/**
 * Adapt a pino instance to the Logger interface.
 * Pino takes the merge object first, so the arguments are swapped here.
 */
function wrap(instance: pino.Logger): Logger {
  const log =
    (level: LogLevel) =>
    (msg: string, context?: LogContext): void => {
      if (context) {
        instance[level](context, msg);
      } else {
        instance[level](msg);
      }
    };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
    fatal: log('fatal'),
    child: (bindings) => wrap(instance.child(bindings)),
  };
}

/** Create a structured pino logger instance. */
export function createLogger(options?: { level?: string; name?: string }): Logger {
  const pinoInstance = pino({
    name: options?.name ?? 'stowage',
    level: options?.level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport:
      process.env['NODE_ENV'] === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    serializers: {
      err: pino.stdSerializers.err,
    },
    // Secret payloads never reach the log sink, even if a caller passes them.
    redact: {
      paths: ['data', '*.data', 'password', 'token', 'authorization', '*.token', '*.authorization'],
      censor: '[REDACTED]',
    },
  });

  return wrap(pinoInstance);
}

/** A Logger that discards everything; handy as a default in tests and libraries. */
export function createNoopLogger(): Logger {
  const noop = (): void => undefined;
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    fatal: noop,
    child: () => logger,
  };
  return logger;
}
