// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * AbortSignal helpers that surface cancellation as CancelledError.
 */

import { CancelledError } from '../rag/errors.js';
import { logger } from '../logger.js';

/**
 * Throw CancelledError if the signal has already fired.
 */
export function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new CancelledError(stage);
  }
}

/**
 * Race a promise against the signal. The underlying work is not stopped,
 * so pass the signal to it as well where the API accepts one.
 */
export function abortable<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  stage: string
): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    detach(promise, stage);
    return Promise.reject(new CancelledError(stage));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      detach(promise, stage);
      reject(new CancelledError(stage));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Observe a promise whose result no longer matters after cancellation.
 */
function detach(promise: Promise<unknown>, stage: string): void {
  promise.catch((error: unknown) => {
    logger.debug(`Ignored ${stage} failure after cancellation: ${error instanceof Error ? error.message : String(error)}`);
  });
}
