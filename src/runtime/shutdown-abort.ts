import type { ProcessSignals, ShutdownSignal } from './ports/process-signals.js';

export interface ShutdownAbort {
  readonly signal: AbortSignal;
  /** Stop listening; call once the run has finished. */
  dispose(): void;
}

/**
 * Abort the returned signal on the first of `watched`. The abort reason names
 * the signal, which ends up in the CANCELLED outcome.
 */
export function abortOnShutdown(
  signals: ProcessSignals,
  watched: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM']
): ShutdownAbort {
  const controller = new AbortController();
  const unsubscribes = watched.map((name) =>
    signals.once(name, () => {
      controller.abort(new Error(`received ${name}`));
    })
  );

  return {
    signal: controller.signal,
    dispose: () => {
      for (const unsubscribe of unsubscribes) unsubscribe();
    },
  };
}
