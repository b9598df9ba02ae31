import type { Brand } from '../../runtime/brand.js';
import type { Action } from './action.js';
import type { JsonObject } from './json-types.js';

/**
 * Correlates every invocation of one logical operation.
 * Minted once per run; never reused across runs.
 */
export type BearerToken = Brand<string, 'BearerToken'>;

/**
 * Where a handler lives. Passed explicitly so independent runs can target
 * different endpoints from the same process.
 */
export interface HandlerTarget {
  readonly endpoint: string;
  readonly functionIdentity: string;
}

export interface InvocationRequest {
  readonly action: Action;
  readonly resourceRequest: JsonObject;
  readonly callbackContext: JsonObject;
  readonly bearerToken: BearerToken;
}

/**
 * The first request of a run together with the handler it is addressed to.
 */
export interface InvocationPlan {
  readonly target: HandlerTarget;
  readonly request: InvocationRequest;
}

/**
 * Copy `request`, replacing its callback context wholesale.
 */
export function withCallbackContext(request: InvocationRequest, callbackContext: JsonObject): InvocationRequest {
  return { ...request, callbackContext };
}

/**
 * JSON body sent to the handler endpoint. Field names are part of the wire contract.
 */
export function toWirePayload(request: InvocationRequest): JsonObject {
  return {
    action: request.action,
    bearerToken: request.bearerToken,
    resourceRequest: request.resourceRequest,
    callbackContext: request.callbackContext,
  };
}
