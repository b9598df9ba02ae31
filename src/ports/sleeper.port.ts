import type { ResultAsync } from 'neverthrow';
import type { CancelledError } from '../domain/invocation/invocation-errors.js';

/**
 * Cancellable wait between invocations.
 *
 * Implementations must settle with CANCELLED as soon as `signal` aborts
 * (including when it is already aborted) and must not hold the event loop
 * busy while waiting.
 */
export interface Sleeper {
  sleep(ms: number, signal?: AbortSignal): ResultAsync<void, CancelledError>;
}
