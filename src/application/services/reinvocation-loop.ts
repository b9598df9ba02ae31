import type { HandlerClient } from '../../ports/handler-client.port.js';
import type { Sleeper } from '../../ports/sleeper.port.js';
import type { Logger } from '../../core/logging/index.js';
import type { InvocationPlan } from '../../domain/invocation/invocation-request.js';
import type { LoopState, ReinvokeBudget, TerminalLoopState } from '../../domain/invocation/loop-state.js';
import { isTerminal } from '../../domain/invocation/loop-state.js';
import {
  applyProgressEvent,
  beginInvocation,
  failLoop,
  initialLoopState,
  withinBudget,
} from '../../domain/invocation/loop-transitions.js';
import { parseProgressEvent } from '../../domain/invocation/progress-event.js';
import { cancelled } from '../../domain/invocation/invocation-errors.js';

export interface ReinvocationLoopDeps {
  readonly client: HandlerClient;
  readonly sleeper: Sleeper;
  readonly logger: Logger;
}

export interface RunOptions {
  readonly budget: ReinvokeBudget;
  readonly signal?: AbortSignal;
}

/**
 * Drives one logical operation to a terminal state.
 *
 * Each run owns its LoopState; nothing is shared between concurrent runs
 * except the (concurrency-safe) HandlerClient.
 */
export class ReinvocationLoop {
  constructor(private readonly deps: ReinvocationLoopDeps) {}

  async run(plan: InvocationPlan, options: RunOptions): Promise<TerminalLoopState> {
    const { signal } = options;
    const log = this.deps.logger.child({ bearerToken: plan.request.bearerToken, action: plan.request.action });
    let state: LoopState = initialLoopState(plan.request, options.budget);

    while (!isTerminal(state)) {
      if (state.status.kind === 'continuing') {
        const delaySeconds = state.status.delaySeconds;
        // No point waiting for an invocation the budget will suppress.
        if (delaySeconds > 0 && withinBudget(state.invocationCount + 1, state.budget)) {
          log.debug({ delaySeconds }, 'Waiting before re-invocation');
          const slept = await this.deps.sleeper.sleep(delaySeconds * 1000, signal);
          if (slept.isErr()) {
            state = failLoop(state, slept.error);
            continue;
          }
        }
      }

      if (signal?.aborted) {
        state = failLoop(state, cancelled(signal.reason));
        continue;
      }

      state = beginInvocation(state);
      if (state.status.kind !== 'running') continue;

      log.debug(
        { invocation: state.invocationCount, callbackContext: state.request.callbackContext },
        'Invoking handler'
      );
      const response = await this.deps.client.invoke(plan.target, state.request, { signal });
      if (response.isErr()) {
        state = failLoop(state, response.error);
        continue;
      }

      const parsed = parseProgressEvent(response.value);
      if (parsed.isErr()) {
        state = failLoop(state, parsed.error);
        continue;
      }

      for (const warning of parsed.value.warnings) {
        log.warn({ invocation: state.invocationCount, warning }, 'Handler response violates the contract');
      }
      log.debug({ invocation: state.invocationCount, status: parsed.value.event.status }, 'Handler responded');
      state = applyProgressEvent(state, parsed.value);
    }

    log.info({ outcome: state.status.kind, invocationCount: state.invocationCount }, 'Run finished');
    return state;
  }
}
