import type { LoopError } from './invocation-errors.js';
import type { InvocationRequest } from './invocation-request.js';
import type { ContractWarning, FailedEvent, InProgressEvent, ProgressEvent, SuccessEvent } from './progress-event.js';

/**
 * How many IN_PROGRESS re-invocations a run may issue after the first call.
 */
export type ReinvokeBudget =
  | { readonly kind: 'unbounded' }
  | { readonly kind: 'bounded'; readonly maxReinvoke: number };

export type ActiveLoopStatus =
  | { readonly kind: 'pending' }
  | { readonly kind: 'running' }
  | { readonly kind: 'continuing'; readonly delaySeconds: number };

export type TerminalLoopStatus =
  | { readonly kind: 'done_success'; readonly event: SuccessEvent }
  | { readonly kind: 'done_failed'; readonly event: FailedEvent }
  | { readonly kind: 'done_exhausted'; readonly event: InProgressEvent }
  | { readonly kind: 'done_error'; readonly error: LoopError };

export type LoopStatus = ActiveLoopStatus | TerminalLoopStatus;

export interface LoopState<S extends LoopStatus = LoopStatus> {
  readonly status: S;
  /** Incremented before each invocation, including one suppressed by the budget. */
  readonly invocationCount: number;
  readonly budget: ReinvokeBudget;
  /** The request issued last, or the next one to issue while continuing. */
  readonly request: InvocationRequest;
  readonly lastEvent?: ProgressEvent;
  readonly warnings: readonly ContractWarning[];
}

export type TerminalLoopState = LoopState<TerminalLoopStatus>;

export function isTerminal(state: LoopState): state is TerminalLoopState {
  switch (state.status.kind) {
    case 'done_success':
    case 'done_failed':
    case 'done_exhausted':
    case 'done_error':
      return true;
    case 'pending':
    case 'running':
    case 'continuing':
      return false;
  }
}

export function budgetFromMaxReinvoke(maxReinvoke: number | undefined): ReinvokeBudget {
  return maxReinvoke === undefined ? { kind: 'unbounded' } : { kind: 'bounded', maxReinvoke };
}

/**
 * Number of handler calls actually issued. An exhausted run counted one
 * invocation it never made.
 */
export function invocationsIssued(state: TerminalLoopState): number {
  return state.status.kind === 'done_exhausted' ? state.invocationCount - 1 : state.invocationCount;
}
