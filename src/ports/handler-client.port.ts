import type { ResultAsync } from 'neverthrow';
import type { HandlerCallError } from '../domain/invocation/invocation-errors.js';
import type { HandlerTarget, InvocationRequest } from '../domain/invocation/invocation-request.js';
import type { JsonObject } from '../domain/invocation/json-types.js';

/**
 * Decoded JSON object returned by one handler call, not yet validated as a ProgressEvent.
 */
export type RawResponse = JsonObject;

export interface InvokeOptions {
  readonly signal?: AbortSignal;
}

/**
 * Port: one request/response exchange with a handler.
 *
 * Pure transport: no retries, no caching, no status interpretation.
 * Implementations may pool connections but must be safe for concurrent use
 * by unrelated runs.
 */
export interface HandlerClient {
  invoke(target: HandlerTarget, request: InvocationRequest, options?: InvokeOptions): ResultAsync<RawResponse, HandlerCallError>;
}
