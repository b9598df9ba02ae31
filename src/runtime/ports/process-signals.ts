/**
 * Signals that ask a run to stop.
 */
export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

export type Unsubscribe = () => void;

/**
 * Port over `process.once` so cancellation wiring stays testable and test
 * runs never touch the real process handlers.
 */
export interface ProcessSignals {
  once(signal: ShutdownSignal, handler: () => void): Unsubscribe;
}
