/**
 * Runtime mode of the current process.
 * Injected (DI), not inferred ad-hoc via env vars.
 */
export type RuntimeMode =
  | { kind: 'production' }
  | { kind: 'test' }
  | { kind: 'cli' };

/**
 * Whether the process may hook SIGINT/SIGTERM. Tests leave signals to the runner.
 */
export type ProcessLifecyclePolicy =
  | { kind: 'install_signal_handlers' }
  | { kind: 'no_signal_handlers' };
