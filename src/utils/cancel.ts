// Path: src/utils/cancel.ts
// Cancellation and timeout helpers around AbortSignal

import { RdsIamError } from './error.js';

/**
 * Build the error returned when a caller's signal has been aborted.
 */
export function cancelledError(operation: string, signal?: AbortSignal): RdsIamError {
  return new RdsIamError(`${operation}: operation cancelled`, 'CANCELLED', {
    cause: signal?.reason,
  });
}

/**
 * Throw a CANCELLED error if the signal is already aborted.
 */
export function throwIfAborted(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw cancelledError(operation, signal);
  }
}

/**
 * Race a promise against an abort signal.
 *
 * The underlying work is not interrupted, but the caller is released as soon as the
 * signal fires and any late result is dropped.
 *
 * @param promise - Work to wait for
 * @param signal - Caller's signal; without one the promise is returned as is
 * @param operation - Name used in the cancellation message
 */
export function withAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  operation: string
): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(cancelledError(operation, signal));
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}
