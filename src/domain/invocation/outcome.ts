import type { LoopError } from './invocation-errors.js';
import type { Action } from './action.js';
import type { BearerToken } from './invocation-request.js';
import type { JsonValue } from './json-types.js';
import type { TerminalLoopState } from './loop-state.js';
import { invocationsIssued } from './loop-state.js';
import type { ContractWarning, InProgressEvent } from './progress-event.js';
import { assertNever } from '../../runtime/assert-never.js';

interface OutcomeBase {
  readonly action: Action;
  readonly bearerToken: BearerToken;
  readonly invocations: number;
  readonly warnings: readonly ContractWarning[];
}

/**
 * The single result of one run.
 */
export type ExitOutcome =
  | (OutcomeBase & {
      readonly kind: 'succeeded';
      readonly message?: string;
      readonly resourceModel?: JsonValue;
      readonly resourceModels?: readonly JsonValue[];
      readonly nextToken?: string;
    })
  | (OutcomeBase & { readonly kind: 'handler_failed'; readonly errorCode: string; readonly message?: string })
  | (OutcomeBase & { readonly kind: 'budget_exhausted'; readonly maxReinvoke: number; readonly lastEvent: InProgressEvent })
  | (OutcomeBase & { readonly kind: 'invocation_error'; readonly error: LoopError });

export type ExitOutcomeKind = ExitOutcome['kind'];

/**
 * Map a finished run to its outcome. No side effects.
 */
export function reportOutcome(state: TerminalLoopState): ExitOutcome {
  const base: OutcomeBase = {
    action: state.request.action,
    bearerToken: state.request.bearerToken,
    invocations: invocationsIssued(state),
    warnings: state.warnings,
  };
  const status = state.status;

  switch (status.kind) {
    case 'done_success': {
      const { event } = status;
      return {
        ...base,
        kind: 'succeeded',
        ...(event.message !== undefined ? { message: event.message } : {}),
        ...(event.resourceModel !== undefined ? { resourceModel: event.resourceModel } : {}),
        ...(event.resourceModels !== undefined ? { resourceModels: event.resourceModels } : {}),
        ...(event.nextToken !== undefined ? { nextToken: event.nextToken } : {}),
      };
    }

    case 'done_failed':
      return {
        ...base,
        kind: 'handler_failed',
        errorCode: status.event.errorCode,
        ...(status.event.message !== undefined ? { message: status.event.message } : {}),
      };

    case 'done_exhausted':
      return {
        ...base,
        kind: 'budget_exhausted',
        // Exhaustion is impossible without a bound.
        maxReinvoke: state.budget.kind === 'bounded' ? state.budget.maxReinvoke : base.invocations - 1,
        lastEvent: status.event,
      };

    case 'done_error':
      return { ...base, kind: 'invocation_error', error: status.error };

    default:
      return assertNever(status);
  }
}
