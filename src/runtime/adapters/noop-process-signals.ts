import type { ProcessSignals, Unsubscribe } from '../ports/process-signals.js';

/**
 * ProcessSignals for test mode: registers nothing, so a run only ends by
 * its own AbortSignal.
 */
export class NoopProcessSignals implements ProcessSignals {
  once(): Unsubscribe {
    return () => undefined;
  }
}
