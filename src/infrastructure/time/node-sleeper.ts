import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA, errAsync, okAsync } from 'neverthrow';
import type { CancelledError } from '../../domain/invocation/invocation-errors.js';
import { cancelled } from '../../domain/invocation/invocation-errors.js';
import type { Sleeper } from '../../ports/sleeper.port.js';

/** Longest delay a Node timer accepts; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Timer-backed Sleeper. Aborting `signal` clears the timer and settles the wait.
 * Waits longer than one timer allows are served as consecutive timers.
 */
export class NodeSleeper implements Sleeper {
  sleep(ms: number, signal?: AbortSignal): ResultAsync<void, CancelledError> {
    if (signal?.aborted) return errAsync(cancelled(signal.reason));
    if (!(ms > 0)) return okAsync(undefined);

    const slice = Math.min(ms, MAX_TIMER_DELAY_MS);
    return RA.fromPromise(waitFor(slice, signal), () => cancelled(signal?.reason)).andThen(() =>
      this.sleep(ms - slice, signal)
    );
  }
}

function waitFor(ms: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
