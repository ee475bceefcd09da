/**
 * Base error class for all Stowage errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class StowageError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: unknown;
    context?: Record<string, unknown>;
    isOperational?: boolean;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'StowageError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
    this.isOperational = params.isOperational ?? true;
  }
}

/** Thrown by validation callbacks to reject a resource mutation. */
export class ValidationError extends StowageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Thrown when a backend call is cancelled through its abort signal. */
export class AbortedError extends StowageError {
  constructor(operation: string, reason?: unknown) {
    super({
      message: `Operation "${operation}" was aborted`,
      code: 'ABORTED',
      statusCode: 499,
      cause: reason,
      context: { operation },
    });
    this.name = 'AbortedError';
  }
}
