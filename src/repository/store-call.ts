/**
 * Store call wrapper
 * Every repository call made by a service goes through callStore so that
 * failures surface as StoreFailureError and cancellation aborts the await.
 */

import { ScheduleError, StoreFailureError } from '../errors.js';
import { logger } from '../logger.js';
import type { StoreCallOptions } from './interfaces.js';

const cancelled = (operation: string, signal: AbortSignal): StoreFailureError =>
  new StoreFailureError(`${operation} cancelled`, { cause: signal.reason });

const toStoreFailure = (operation: string, error: unknown): ScheduleError =>
  error instanceof ScheduleError ? error : new StoreFailureError(`failed to ${operation}`, { cause: error });

/**
 * Run a repository call, racing it against the caller's abort signal
 *
 * @param operation - Short description used in error messages ("list followed streamers")
 * @param options - Carries the caller's AbortSignal
 * @param run - The repository call itself
 */
export async function callStore<T>(
  operation: string,
  options: StoreCallOptions | undefined,
  run: () => Promise<T>
): Promise<T> {
  const signal = options?.signal;

  if (signal?.aborted) {
    throw cancelled(operation, signal);
  }

  if (!signal) {
    try {
      return await run();
    } catch (error) {
      throw toStoreFailure(operation, error);
    }
  }

  // A store may throw before returning its promise
  let pending: Promise<T>;
  try {
    pending = run();
  } catch (error) {
    throw toStoreFailure(operation, error);
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => {
      // The store may still settle later; keep a late rejection from going unhandled
      pending.catch((error: unknown) => {
        logger.debug({ err: error, operation }, 'store call settled after cancellation');
      });
      reject(cancelled(operation, signal));
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });

  try {
    return await Promise.race([pending, aborted]);
  } catch (error) {
    throw toStoreFailure(operation, error);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/**
 * True when a batch loop should stop instead of skipping the failing streamer
 */
export function isCancelled(options: StoreCallOptions | undefined): boolean {
  return options?.signal?.aborted === true;
}
