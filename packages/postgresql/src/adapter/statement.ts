import { CancellationError } from '@keyql/core';

/**
 * pg cannot cancel a running statement from a signal; an aborted signal
 * stops the statement from being sent.
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancellationError();
  }
}
