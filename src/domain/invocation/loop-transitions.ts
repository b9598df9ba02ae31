import type { LoopError } from './invocation-errors.js';
import type { InvocationRequest } from './invocation-request.js';
import { withCallbackContext } from './invocation-request.js';
import type { LoopState, ReinvokeBudget, TerminalLoopState } from './loop-state.js';
import type { ParsedProgressEvent } from './progress-event.js';
import { assertNever } from '../../runtime/assert-never.js';

/**
 * Pure transitions of the re-invocation state machine. The driver in
 * ReinvocationLoop owns the state value and performs the I/O between them.
 */

export function initialLoopState(request: InvocationRequest, budget: ReinvokeBudget): LoopState {
  return { status: { kind: 'pending' }, invocationCount: 0, budget, request, warnings: [] };
}

/**
 * Whether invocation number `invocationCount` may be issued under `budget`.
 * The first invocation is never counted against the budget.
 */
export function withinBudget(invocationCount: number, budget: ReinvokeBudget): boolean {
  if (invocationCount <= 1 || budget.kind === 'unbounded') return true;
  return invocationCount - 1 <= budget.maxReinvoke;
}

/**
 * pending|continuing → running, or → done_exhausted without invoking.
 */
export function beginInvocation(state: LoopState): LoopState {
  if (state.status.kind !== 'pending' && state.status.kind !== 'continuing') {
    throw new Error(`beginInvocation called in state '${state.status.kind}'`);
  }

  const invocationCount = state.invocationCount + 1;
  if (!withinBudget(invocationCount, state.budget)) {
    // Only reachable after an IN_PROGRESS response, so lastEvent is that event.
    const last = state.lastEvent;
    if (last === undefined || last.status !== 'IN_PROGRESS') {
      throw new Error('Budget exhausted without a preceding IN_PROGRESS event');
    }
    return { ...state, invocationCount, status: { kind: 'done_exhausted', event: last } };
  }

  return { ...state, invocationCount, status: { kind: 'running' } };
}

/**
 * running → done_success | done_failed | continuing.
 */
export function applyProgressEvent(state: LoopState, parsed: ParsedProgressEvent): LoopState {
  const { event } = parsed;
  const warnings = parsed.warnings.length ? [...state.warnings, ...parsed.warnings] : state.warnings;

  switch (event.status) {
    case 'SUCCESS':
      return { ...state, lastEvent: event, warnings, status: { kind: 'done_success', event } };
    case 'FAILED':
      return { ...state, lastEvent: event, warnings, status: { kind: 'done_failed', event } };
    case 'IN_PROGRESS':
      return {
        ...state,
        lastEvent: event,
        warnings,
        request: withCallbackContext(state.request, event.callbackContext),
        status: { kind: 'continuing', delaySeconds: event.callbackDelaySeconds ?? 0 },
      };
    default:
      return assertNever(event);
  }
}

/**
 * Any state → done_error.
 */
export function failLoop(state: LoopState, error: LoopError): TerminalLoopState {
  return { ...state, status: { kind: 'done_error', error } };
}
