import { AbortedError } from './errors.js';

/**
 * Run a backend round trip that rejects as soon as `abortSignal` fires.
 * The in-flight request is abandoned; its eventual outcome is discarded.
 */
export function abortable<T>(
  operation: string,
  run: () => Promise<T>,
  abortSignal?: AbortSignal,
): Promise<T> {
  if (!abortSignal) return run();
  if (abortSignal.aborted) {
    return Promise.reject(new AbortedError(operation, abortSignal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new AbortedError(operation, abortSignal.reason));
    };
    abortSignal.addEventListener('abort', onAbort, { once: true });

    void run().then(
      (value) => {
        abortSignal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        abortSignal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}
