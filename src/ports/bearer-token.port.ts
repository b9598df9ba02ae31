import type { BearerToken } from '../domain/invocation/invocation-request.js';

/**
 * Source of bearer tokens. Each call returns a token never returned before.
 */
export interface BearerTokenSource {
  next(): BearerToken;
}
