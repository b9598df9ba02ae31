import { InvokeCommand, LambdaClient } from '@aws-sdk/client-lambda';
import type { Result, ResultAsync } from 'neverthrow';
import { ResultAsync as RA, err, errAsync, ok } from 'neverthrow';
import type { Logger } from '../../core/logging/index.js';
import type { HandlerCallError } from '../../domain/invocation/invocation-errors.js';
import { cancelled } from '../../domain/invocation/invocation-errors.js';
import type { HandlerTarget, InvocationRequest } from '../../domain/invocation/invocation-request.js';
import { toWirePayload } from '../../domain/invocation/invocation-request.js';
import { parseJson, stringifyJson } from '../../domain/invocation/json-codec.js';
import type { JsonValue } from '../../domain/invocation/json-types.js';
import { isJsonObject } from '../../domain/invocation/json-types.js';
import type { HandlerClient, InvokeOptions, RawResponse } from '../../ports/handler-client.port.js';

export interface LambdaInvokeInput {
  readonly FunctionName: string;
  readonly Payload: Uint8Array;
}

/** The part of the Lambda Invoke response the harness reads. */
export interface LambdaInvokeOutput {
  readonly StatusCode?: number;
  readonly FunctionError?: string;
  readonly Payload?: Uint8Array;
}

export type LambdaInvokeFn = (
  target: HandlerTarget,
  input: LambdaInvokeInput,
  abortSignal: AbortSignal
) => Promise<LambdaInvokeOutput>;

export interface LambdaHandlerClientOptions {
  /** Per-invocation deadline. */
  readonly timeoutMs: number;
  readonly logger: Logger;
  readonly invoke: LambdaInvokeFn;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * HandlerClient for Lambda-compatible endpoints (a deployed function or a
 * local SAM emulator).
 */
export class LambdaHandlerClient implements HandlerClient {
  private readonly log: Logger;

  constructor(private readonly options: LambdaHandlerClientOptions) {
    this.log = options.logger.child({ component: 'LambdaHandlerClient' });
  }

  invoke(target: HandlerTarget, request: InvocationRequest, options: InvokeOptions = {}): ResultAsync<RawResponse, HandlerCallError> {
    const external = options.signal;
    if (external?.aborted) return errAsync(cancelled(external.reason));

    const input: LambdaInvokeInput = {
      FunctionName: target.functionIdentity,
      Payload: encoder.encode(stringifyJson(toWirePayload(request))),
    };

    const { timeoutMs } = this.options;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error(`No response within ${timeoutMs}ms`));
    }, timeoutMs);
    const onAbort = (): void => {
      controller.abort(external?.reason);
    };
    external?.addEventListener('abort', onAbort, { once: true });

    this.log.trace({ endpoint: target.endpoint, functionName: target.functionIdentity }, 'Lambda invoke');

    // Deferred so a synchronous throw becomes a rejection; raced so an invoke
    // function that ignores its signal still yields to the deadline and to cancellation.
    const call = Promise.race([
      Promise.resolve().then(() => this.options.invoke(target, input, controller.signal)),
      rejectOnAbort(controller.signal),
    ]).finally(() => {
      clearTimeout(timer);
      external?.removeEventListener('abort', onAbort);
    });

    return RA.fromPromise(call, (e): HandlerCallError => {
      if (external?.aborted) return cancelled(external.reason);
      if (timedOut) return { code: 'TIMEOUT', message: `Handler did not respond within ${timeoutMs}ms`, timeoutMs };
      return classifySdkError(e, target);
    }).andThen(decodeOutput);
  }
}

function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

function decodeOutput(output: LambdaInvokeOutput): Result<RawResponse, HandlerCallError> {
  const text = output.Payload ? decoder.decode(output.Payload) : '';

  if (output.FunctionError) {
    return err({
      code: 'PROTOCOL_ERROR',
      message: `Handler function raised an error (${output.FunctionError}) instead of returning a progress event`,
      raw: text,
    });
  }
  if (text.trim().length === 0) {
    return err({ code: 'PROTOCOL_ERROR', message: 'Handler returned an empty payload', raw: text });
  }

  let body: JsonValue;
  try {
    body = parseJson(text);
  } catch (e) {
    return err({
      code: 'PROTOCOL_ERROR',
      message: `Handler payload is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
      raw: text,
    });
  }

  if (!isJsonObject(body)) {
    return err({ code: 'PROTOCOL_ERROR', message: 'Handler payload is not a JSON object', raw: text });
  }
  return ok(body);
}

function classifySdkError(e: unknown, target: HandlerTarget): HandlerCallError {
  const message = e instanceof Error ? `${e.name}: ${e.message}` : String(e);
  // Service exceptions carry response metadata: the endpoint answered, but not with a payload.
  if (hasHttpStatus(e)) {
    return { code: 'PROTOCOL_ERROR', message: `Endpoint rejected the invocation: ${message}` };
  }
  return { code: 'CONNECTION_ERROR', message: `Could not reach ${target.endpoint}: ${message}`, endpoint: target.endpoint };
}

function hasHttpStatus(e: unknown): boolean {
  if (typeof e !== 'object' || e === null || !('$metadata' in e)) return false;
  const metadata = e.$metadata;
  return typeof metadata === 'object' && metadata !== null && 'httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number';
}

export interface PooledLambdaInvokerOptions {
  readonly region: string;
}

/**
 * Default LambdaInvokeFn: one SDK client per endpoint, shared by every run.
 * SDK retries are disabled so each invocation is exactly one call.
 */
export function createPooledLambdaInvoker(options: PooledLambdaInvokerOptions): LambdaInvokeFn {
  const clients = new Map<string, LambdaClient>();

  const clientFor = (endpoint: string): LambdaClient => {
    let client = clients.get(endpoint);
    if (!client) {
      client = new LambdaClient({ endpoint, region: options.region, maxAttempts: 1 });
      clients.set(endpoint, client);
    }
    return client;
  };

  return (target, input, abortSignal) =>
    clientFor(target.endpoint).send(
      new InvokeCommand({ FunctionName: input.FunctionName, InvocationType: 'RequestResponse', Payload: input.Payload }),
      { abortSignal }
    );
}
