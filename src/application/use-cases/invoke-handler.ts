import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { parseAction } from '../../domain/invocation/action.js';
import type { RequestConfigurationError } from '../../domain/invocation/invocation-errors.js';
import type { HandlerTarget } from '../../domain/invocation/invocation-request.js';
import type { ReinvokeBudget } from '../../domain/invocation/loop-state.js';
import type { ExitOutcome } from '../../domain/invocation/outcome.js';
import { reportOutcome } from '../../domain/invocation/outcome.js';
import { RequestBuilder } from '../../domain/invocation/request-builder.js';
import type { BearerTokenSource } from '../../ports/bearer-token.port.js';
import type { ReinvocationLoop } from '../services/reinvocation-loop.js';

export interface InvokeHandlerInput {
  readonly action: string;
  /** Already-parsed request body. */
  readonly body: unknown;
  readonly target: HandlerTarget;
  readonly budget: ReinvokeBudget;
  readonly signal?: AbortSignal;
}

export interface InvokeHandlerDeps {
  readonly tokens: BearerTokenSource;
  readonly loop: ReinvocationLoop;
}

export type InvokeHandlerResult = Result<ExitOutcome, RequestConfigurationError>;

/**
 * Validate the action and body, run the loop, and report its outcome.
 * Configuration errors are returned before any invocation is attempted.
 */
export function createInvokeHandlerUseCase(deps: InvokeHandlerDeps) {
  return async function invokeHandler(input: InvokeHandlerInput): Promise<InvokeHandlerResult> {
    const action = parseAction(input.action);
    if (action.isErr()) return err(action.error);

    const builder = new RequestBuilder({ target: input.target, tokens: deps.tokens });
    const plan = builder.buildInitialRequest(action.value, input.body);
    if (plan.isErr()) return err(plan.error);

    const finalState = await deps.loop.run(plan.value, { budget: input.budget, signal: input.signal });
    return ok(reportOutcome(finalState));
  };
}

export type InvokeHandlerUseCase = ReturnType<typeof createInvokeHandlerUseCase>;
