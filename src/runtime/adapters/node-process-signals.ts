import type { ProcessSignals, ShutdownSignal, Unsubscribe } from '../ports/process-signals.js';

/**
 * Node.js adapter for ProcessSignals. While a handler is registered the
 * signal no longer kills the process; Node's default returns once it is removed.
 */
export class NodeProcessSignals implements ProcessSignals {
  once(signal: ShutdownSignal, handler: () => void): Unsubscribe {
    const listener = (): void => handler();
    process.once(signal, listener);
    return () => {
      process.removeListener(signal, listener);
    };
  }
}
