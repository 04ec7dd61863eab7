import { CancellationError } from '@keyql/core';

/**
 * mysql2 takes no AbortSignal; an aborted signal stops the statement from
 * being sent.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancellationError();
  }
}
