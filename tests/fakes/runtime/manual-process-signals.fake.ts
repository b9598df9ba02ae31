import type { ProcessSignals, ShutdownSignal, Unsubscribe } from '../../../src/runtime/ports/process-signals.js';

/**
 * ProcessSignals driven by the test: `raise` plays the part of the OS.
 */
export class ManualProcessSignals implements ProcessSignals {
  private readonly handlers = new Map<ShutdownSignal, Set<() => void>>();

  once(signal: ShutdownSignal, handler: () => void): Unsubscribe {
    const set = this.handlers.get(signal) ?? new Set<() => void>();
    this.handlers.set(signal, set);
    const wrapped = (): void => {
      set.delete(wrapped);
      handler();
    };
    set.add(wrapped);
    return () => {
      set.delete(wrapped);
    };
  }

  raise(signal: ShutdownSignal): void {
    for (const handler of [...(this.handlers.get(signal) ?? [])]) handler();
  }

  listenerCount(signal: ShutdownSignal): number {
    return this.handlers.get(signal)?.size ?? 0;
  }
}
