import { ResultAsync, err, errAsync, okAsync } from 'neverthrow';
import type { Result } from 'neverthrow';
import type { HandlerClient, InvokeOptions, RawResponse } from '../../../src/ports/handler-client.port.js';
import type { HandlerCallError } from '../../../src/domain/invocation/invocation-errors.js';
import { cancelled } from '../../../src/domain/invocation/invocation-errors.js';
import type { HandlerTarget, InvocationRequest } from '../../../src/domain/invocation/invocation-request.js';

export type ScriptStep =
  | { kind: 'respond'; body: RawResponse }
  | { kind: 'fail'; error: HandlerCallError }
  /** Never answers; settles with CANCELLED once the signal aborts. */
  | { kind: 'hang' };

export interface RecordedCall {
  readonly target: HandlerTarget;
  readonly request: InvocationRequest;
}

/**
 * Fake handler that replays a script of responses, one per invocation.
 * The last step repeats once the script runs out.
 */
export class ScriptedHandlerClient implements HandlerClient {
  readonly calls: RecordedCall[] = [];

  constructor(
    private readonly script: readonly ScriptStep[],
    private readonly onCall?: (callNumber: number) => void
  ) {
    if (script.length === 0) throw new Error('ScriptedHandlerClient needs at least one step');
  }

  static respondingWith(...bodies: RawResponse[]): ScriptedHandlerClient {
    return new ScriptedHandlerClient(bodies.map((body) => ({ kind: 'respond', body })));
  }

  invoke(target: HandlerTarget, request: InvocationRequest, options: InvokeOptions = {}): ResultAsync<RawResponse, HandlerCallError> {
    this.calls.push({ target, request });
    const step = this.script[Math.min(this.calls.length, this.script.length) - 1];
    this.onCall?.(this.calls.length);

    if (step === undefined) return errAsync({ code: 'PROTOCOL_ERROR', message: 'script exhausted' });

    switch (step.kind) {
      case 'respond':
        return okAsync(step.body);
      case 'fail':
        return errAsync(step.error);
      case 'hang':
        return new ResultAsync(waitForAbort(options.signal));
    }
  }

  // Test utilities
  get invocationCount(): number {
    return this.calls.length;
  }

  requestAt(index: number): InvocationRequest {
    const call = this.calls[index];
    if (!call) throw new Error(`No invocation #${index + 1} recorded`);
    return call.request;
  }
}

function waitForAbort(signal: AbortSignal | undefined): Promise<Result<RawResponse, HandlerCallError>> {
  return new Promise((resolve) => {
    if (!signal) return;
    if (signal.aborted) {
      resolve(err(cancelled(signal.reason)));
      return;
    }
    signal.addEventListener('abort', () => resolve(err(cancelled(signal.reason))), { once: true });
  });
}
